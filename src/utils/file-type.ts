/**
 * Input classification from magic bytes.
 * Photographed JPEG submissions take the image path; everything else (PDF, PNG,
 * unrecognized content) is handled as a scanned PDF.
 */

import { fileTypeFromBuffer } from "file-type";
import type { FileKind } from "../types.js";

export interface FileKindDetection {
  kind: FileKind;
  /** MIME type read from the signature, undefined when unrecognized */
  mimeType?: string;
}

export async function detectFileKind(
  fileBytes: Uint8Array,
): Promise<FileKindDetection> {
  const detected = await fileTypeFromBuffer(fileBytes);
  const mimeType = detected?.mime;

  return {
    kind: mimeType === "image/jpeg" ? "jpg" : "pdf",
    mimeType,
  };
}
