import { randomUUID } from "node:crypto";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import type { Logger } from "@indexflow/logger";
import type { UploadedFile } from "@indexflow/types";

export interface ReceivedFile {
  originalname: string;
  buffer: Buffer;
}

/**
 * multer hands over multipart filenames decoded as latin1. Clients send them as
 * UTF-8, so the bytes are re-read as UTF-8.
 */
export function decodeFilename(name: string): string {
  return Buffer.from(name, "latin1").toString("utf8");
}

/**
 * Write received files to the upload directory as
 * `<32-hex random id>_<original filename>`.
 */
export async function storeUploads(
  uploadDir: string,
  files: ReceivedFile[],
  logger: Logger,
): Promise<UploadedFile[]> {
  await mkdir(uploadDir, { recursive: true });
  const stored: UploadedFile[] = [];

  try {
    for (const file of files) {
      const filename = basename(file.originalname);
      const path = join(uploadDir, `${randomUUID().replace(/-/g, "")}_${filename}`);
      await writeFile(path, file.buffer);
      stored.push({ filename, path, sizeBytes: file.buffer.byteLength });
    }
  } catch (err) {
    await removeUploads(stored, logger);
    throw err;
  }

  return stored;
}

export async function removeUploads(files: UploadedFile[], logger: Logger): Promise<void> {
  const results = await Promise.allSettled(files.map((file) => rm(file.path, { force: true })));
  results.forEach((result, i) => {
    if (result.status === "rejected") {
      logger.warn({ err: result.reason, path: files[i]?.path }, "Failed to remove upload");
    }
  });
}
