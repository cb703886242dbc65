import type { PageImage } from '../types';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Standard padded base64 on a single line.
 */
export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/**
 * Check the transport contract for image payloads: padded to a multiple of 4,
 * base64 alphabet only (so no whitespace or newlines), and stable under
 * decode followed by re-encode.
 */
export function isTransportSafeBase64(value: string): boolean {
  if (value.length % 4 !== 0) return false;
  if (!BASE64_PATTERN.test(value)) return false;
  return Buffer.from(value, 'base64').toString('base64') === value;
}

export function isPng(bytes: Uint8Array): boolean {
  if (bytes.length < PNG_SIGNATURE.length) return false;
  return PNG_SIGNATURE.every((byte, i) => bytes[i] === byte);
}

/**
 * Read width and height from the IHDR chunk that follows the signature.
 */
export function readPngDimensions(bytes: Uint8Array): { width: number; height: number } | null {
  if (!isPng(bytes) || bytes.length < 24) return null;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const chunkType = String.fromCharCode(bytes[12], bytes[13], bytes[14], bytes[15]);
  if (chunkType !== 'IHDR') return null;
  return { width: view.getUint32(16), height: view.getUint32(20) };
}

export function toDataUrl(image: PageImage): string {
  return `data:${image.mimeType};base64,${encodeBase64(image.data)}`;
}
