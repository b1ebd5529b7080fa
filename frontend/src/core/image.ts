import { ImageDecodeError } from "../lib/errors";

export type ImageMimeType = "image/png" | "image/jpeg";

export type DecodedImage = {
  mimeType: ImageMimeType;
  bytes: Uint8Array;
  dataUri: string;
};

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];

const startsWith = (bytes: Uint8Array, signature: number[]) =>
  bytes.length > signature.length && signature.every((b, i) => bytes[i] === b);

export function sniffMimeType(bytes: Uint8Array): ImageMimeType | null {
  if (startsWith(bytes, PNG_SIGNATURE)) return "image/png";
  if (startsWith(bytes, JPEG_SIGNATURE)) return "image/jpeg";
  return null;
}

export function toBase64(bytes: Uint8Array): string {
  let binary = "";
  const chunk = 0x8000;
  for (let i = 0; i < bytes.length; i += chunk) {
    binary += String.fromCharCode(...bytes.subarray(i, i + chunk));
  }
  return btoa(binary);
}

/** Accepts PNG and JPEG uploads; anything else raises ImageDecodeError. */
export function decodeImage(bytes: Uint8Array): DecodedImage {
  if (bytes.length === 0) throw new ImageDecodeError("The attached image is empty.");
  const mimeType = sniffMimeType(bytes);
  if (!mimeType) throw new ImageDecodeError("The attached file is not a PNG or JPEG image.");
  return { mimeType, bytes, dataUri: `data:${mimeType};base64,${toBase64(bytes)}` };
}

export function readFileBytes(file: Blob): Promise<Uint8Array> {
  return new Promise((resolve, reject) => {
    const reader = new FileReader();
    reader.onload = () => {
      const result = reader.result;
      if (result === null || typeof result === "string") {
        reject(new ImageDecodeError("Could not read the selected file."));
        return;
      }
      resolve(new Uint8Array(result));
    };
    reader.onerror = () => reject(reader.error ?? new ImageDecodeError("Could not read the selected file."));
    reader.readAsArrayBuffer(file);
  });
}
