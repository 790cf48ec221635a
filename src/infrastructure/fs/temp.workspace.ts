import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { createLogger } from "../logging/logger";

export interface LocalWorkspace {
  readonly dir: string;
  resolve(fileName: string): string;
}

const logger = createLogger("TempWorkspace");

/**
 * Request-scoped temporary directory. Everything written through it is removed by dispose().
 */
export class TempWorkspace implements LocalWorkspace {
  private constructor(readonly dir: string) {}

  static async create(baseDir: string = os.tmpdir(), prefix = "audio-report-"): Promise<TempWorkspace> {
    await fs.mkdir(baseDir, { recursive: true });
    const dir = await fs.mkdtemp(path.join(baseDir, prefix));
    logger.info(`Created ${dir}`);
    return new TempWorkspace(dir);
  }

  resolve(fileName: string): string {
    return path.join(this.dir, path.basename(fileName));
  }

  async dispose(): Promise<void> {
    try {
      await fs.rm(this.dir, { recursive: true, force: true });
      logger.info(`Removed ${this.dir}`);
    } catch (err: unknown) {
      logger.warn(`Failed to remove ${this.dir}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

export async function withTempWorkspace<T>(
  fn: (workspace: TempWorkspace) => Promise<T>,
  baseDir?: string
): Promise<T> {
  const workspace = await TempWorkspace.create(baseDir);
  try {
    return await fn(workspace);
  } finally {
    await workspace.dispose();
  }
}
