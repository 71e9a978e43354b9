import { open } from "node:fs/promises";
import { extname } from "node:path";

/**
 * File classification result
 */
export interface FirmwareInfo {
  /** Broad kind of content */
  kind: "binary" | "image" | "video" | "archive" | "document" | "unknown";
  /** MIME type */
  mimeType: string;
  /** File extension, lowercase, without the dot */
  extension: string;
}

/**
 * Extensions the system MIME table maps to application/octet-stream
 */
const OCTET_STREAM_EXTENSIONS = new Set([
  "bin",
  "a",
  "dll",
  "exe",
  "o",
  "obj",
  "so",
]);

const MAGIC_LENGTH = 12;

/**
 * Decide whether a file is a plain firmware binary
 */
export class FirmwareDetector {
  /**
   * Classify a file from its name and first bytes
   */
  static async detectFromFile(filePath: string): Promise<FirmwareInfo> {
    const handle = await open(filePath, "r");
    try {
      const magic = Buffer.alloc(MAGIC_LENGTH);
      const { bytesRead } = await handle.read(magic, 0, MAGIC_LENGTH, 0);
      const extension = extname(filePath).slice(1).toLowerCase();
      return this.detectFromBuffer(magic.subarray(0, bytesRead), extension);
    } finally {
      await handle.close();
    }
  }

  /**
   * Classify by extension first. Leading bytes only name the content of
   * files whose extension is not an octet-stream one.
   */
  static detectFromBuffer(buffer: Buffer, extension: string = ""): FirmwareInfo {
    if (OCTET_STREAM_EXTENSIONS.has(extension)) {
      return {
        kind: "binary",
        mimeType: "application/octet-stream",
        extension,
      };
    }

    const magic = buffer.subarray(0, MAGIC_LENGTH);

    // GIF: 47 49 46 38 (GIF8)
    if (
      magic[0] === 0x47 &&
      magic[1] === 0x49 &&
      magic[2] === 0x46 &&
      magic[3] === 0x38
    ) {
      return { kind: "image", mimeType: "image/gif", extension: "gif" };
    }

    // JPEG: FF D8 FF
    if (magic[0] === 0xff && magic[1] === 0xd8 && magic[2] === 0xff) {
      return { kind: "image", mimeType: "image/jpeg", extension: "jpg" };
    }

    // PNG: 89 50 4E 47
    if (
      magic[0] === 0x89 &&
      magic[1] === 0x50 &&
      magic[2] === 0x4e &&
      magic[3] === 0x47
    ) {
      return { kind: "image", mimeType: "image/png", extension: "png" };
    }

    // MP4: ftyp box at offset 4
    if (
      magic[4] === 0x66 &&
      magic[5] === 0x74 &&
      magic[6] === 0x79 &&
      magic[7] === 0x70
    ) {
      return { kind: "video", mimeType: "video/mp4", extension: "mp4" };
    }

    // ZIP: 50 4B 03 04
    if (
      magic[0] === 0x50 &&
      magic[1] === 0x4b &&
      magic[2] === 0x03 &&
      magic[3] === 0x04
    ) {
      return { kind: "archive", mimeType: "application/zip", extension: "zip" };
    }

    // GZIP: 1F 8B
    if (magic[0] === 0x1f && magic[1] === 0x8b) {
      return { kind: "archive", mimeType: "application/gzip", extension: "gz" };
    }

    // PDF: 25 50 44 46 (%PDF)
    if (
      magic[0] === 0x25 &&
      magic[1] === 0x50 &&
      magic[2] === 0x44 &&
      magic[3] === 0x46
    ) {
      return {
        kind: "document",
        mimeType: "application/pdf",
        extension: "pdf",
      };
    }

    return { kind: "unknown", mimeType: "", extension };
  }

  static isGenericBinary(info: FirmwareInfo): boolean {
    return info.kind === "binary";
  }
}
