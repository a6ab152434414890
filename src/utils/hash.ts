import { createHash } from "node:crypto";
import { posix } from "node:path";

/** Number of hex characters of the content hash embedded in file names */
export const HASHED_NAME_LENGTH = 12;

/**
 * Calculate SHA-256 hash from file content
 * @param content File content
 * @returns Hash value (hex format, 64 characters)
 */
export function calculateHashFromContent(content: Uint8Array): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Insert a content hash before the extension of a POSIX path.
 *
 * `css/app.css` + `0123456789abcdef...` → `css/app.0123456789ab.css`.
 * Names without an extension get the hash appended.
 */
export function hashedFileName(name: string, contentHash: string): string {
  const { dir, name: stem, ext } = posix.parse(name);
  const fileName = `${stem}.${contentHash.slice(0, HASHED_NAME_LENGTH)}${ext}`;
  return dir ? `${dir}/${fileName}` : fileName;
}
