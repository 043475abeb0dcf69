import { createHash } from "crypto";

/** Lower-case hex SHA-256 of the given bytes. */
export function sha256Hex(data: string | Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}
