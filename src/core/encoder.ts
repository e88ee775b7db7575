import type { ImagePayload } from '../types/index.js';

/**
 * Inline the screenshot as a data URL the model endpoint accepts
 */
export function encodeImage(image: ImagePayload): string {
  if (image.released) {
    throw new Error('Cannot encode a released image');
  }
  if (image.data.length === 0) {
    throw new Error('Cannot encode an empty image');
  }
  return `data:${image.mediaType};base64,${image.data.toString('base64')}`;
}

/**
 * Wipe the screenshot bytes; the payload must not be used afterwards
 */
export function releaseImage(image: ImagePayload): void {
  if (image.released) {
    return;
  }
  image.data.fill(0);
  image.released = true;
}
