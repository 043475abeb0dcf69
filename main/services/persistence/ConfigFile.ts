import fs from "fs/promises";
import path from "path";
import { sha256Hex } from "../../utils/checksum.js";
import { ConfigWriteError, isNotFoundError, toError } from "../../utils/errorTypes.js";
import { logDebug } from "../../utils/logger.js";

export interface ConfigFileContents {
  text: string;
  checksum: string;
}

/**
 * Reads and atomically replaces the config file. Checksums are taken over the
 * exact bytes read or written.
 */
export class ConfigFile {
  /** Returns null when the file does not exist. */
  async read(filePath: string): Promise<ConfigFileContents | null> {
    try {
      const buffer = await fs.readFile(filePath);
      return { text: buffer.toString("utf-8"), checksum: sha256Hex(buffer) };
    } catch (error) {
      if (isNotFoundError(error)) return null;
      throw error;
    }
  }

  async checksum(filePath: string): Promise<string | null> {
    const contents = await this.read(filePath);
    return contents?.checksum ?? null;
  }

  async isDirectory(dirPath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(dirPath);
      return stats.isDirectory();
    } catch (error) {
      if (isNotFoundError(error)) return false;
      throw error;
    }
  }

  async ensureDirectory(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath, { recursive: true });
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Writes `text` to a temporary file beside `filePath` and renames it into
   * place. Returns the checksum of the written bytes.
   */
  async writeAtomic(filePath: string, text: string): Promise<string> {
    const dir = path.dirname(filePath);
    const uniqueSuffix = `${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
    const tempFilePath = `${filePath}.${uniqueSuffix}.tmp`;
    const data = Buffer.from(text, "utf-8");

    const attemptWrite = async (ensureDir: boolean): Promise<void> => {
      if (ensureDir) {
        await fs.mkdir(dir, { recursive: true });
      }
      await fs.writeFile(tempFilePath, data);
      await fs.rename(tempFilePath, filePath);
    };

    try {
      await attemptWrite(false);
    } catch (error) {
      if (!isNotFoundError(error)) {
        await this.cleanupTempFile(tempFilePath);
        throw new ConfigWriteError(filePath, toError(error));
      }

      try {
        await attemptWrite(true);
      } catch (retryError) {
        await this.cleanupTempFile(tempFilePath);
        throw new ConfigWriteError(filePath, toError(retryError));
      }
    }

    return sha256Hex(data);
  }

  private async cleanupTempFile(tempFilePath: string): Promise<void> {
    try {
      await fs.unlink(tempFilePath);
    } catch (error) {
      logDebug("Temporary config file not removed", {
        tempFilePath,
        reason: toError(error).message,
      });
    }
  }
}
