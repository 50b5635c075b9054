/**
 * In-memory object store for testing
 *
 * Keeps every container in a Map. Uploads read real local files and
 * downloads write real local files, so directory transfers can be tested
 * end to end without a cloud endpoint.
 */

import { readFile, writeFile } from "node:fs/promises";
import {
  ContainerNotFoundError,
  ObjectNotFoundError,
} from "../../core/errors.js";
import type {
  ObjectStore,
  TransferConfig,
  TransferLogger,
} from "../../core/types.js";

/**
 * No-op logger for when none is provided
 */
const noopLogger: TransferLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * In-memory ObjectStore implementation
 */
export class MemoryObjectStore implements ObjectStore {
  readonly provider = "memory";

  private readonly containers: Map<string, Map<string, Buffer>> = new Map();
  private readonly logger: TransferLogger;

  constructor(config?: TransferConfig) {
    this.logger = config?.logger ?? noopLogger;
    this.logger.debug({}, "MemoryObjectStore initialized");
  }

  /**
   * Get a container or throw if it does not exist
   */
  private getContainer(container: string): Map<string, Buffer> {
    const objects = this.containers.get(container);
    if (!objects) {
      throw new ContainerNotFoundError(container);
    }
    return objects;
  }

  // ---- Containers ----

  async createContainer(container: string): Promise<boolean> {
    if (this.containers.has(container)) {
      return false;
    }
    this.containers.set(container, new Map());
    this.logger.debug({ container }, "Container created");
    return true;
  }

  async deleteContainer(container: string): Promise<void> {
    const objects = this.getContainer(container);
    if (objects.size > 0) {
      throw new Error(`Container ${container} is not empty`);
    }
    this.containers.delete(container);
  }

  // ---- Single-object transfers ----

  async uploadFile(
    container: string,
    localPath: string,
    key: string,
  ): Promise<number> {
    const objects = this.getContainer(container);
    const buffer = await readFile(localPath);
    objects.set(key, buffer);
    this.logger.debug({ container, key, size: buffer.length }, "Object stored");
    return buffer.length;
  }

  async downloadFile(
    container: string,
    key: string,
    localPath: string,
  ): Promise<number> {
    const buffer = this.getContainer(container).get(key);
    if (!buffer) {
      throw new ObjectNotFoundError(container, key);
    }
    await writeFile(localPath, buffer);
    return buffer.length;
  }

  // ---- Objects ----

  async exists(container: string, key: string): Promise<boolean> {
    return this.containers.get(container)?.has(key) ?? false;
  }

  async listKeys(container: string, prefix = ""): Promise<string[]> {
    const keys: string[] = [];
    for (const key of this.getContainer(container).keys()) {
      if (key.startsWith(prefix)) {
        keys.push(key);
      }
    }
    return keys.sort();
  }

  async deleteKeys(container: string, keys: string[]): Promise<number> {
    const objects = this.getContainer(container);
    let count = 0;
    for (const key of keys) {
      if (objects.delete(key)) {
        count++;
      }
    }
    this.logger.debug({ container, count }, "Objects deleted");
    return count;
  }

  // ---- Lifecycle ----

  async close(): Promise<void> {
    this.containers.clear();
    this.logger.debug({}, "MemoryObjectStore closed");
  }

  // ---- Test Utilities ----

  /**
   * Store an object directly, bypassing the filesystem
   */
  put(container: string, key: string, content: string | Buffer): void {
    let objects = this.containers.get(container);
    if (!objects) {
      objects = new Map();
      this.containers.set(container, objects);
    }
    objects.set(
      key,
      typeof content === "string" ? Buffer.from(content) : Buffer.from(content),
    );
  }

  /**
   * Read an object's content directly
   */
  get(container: string, key: string): Buffer | undefined {
    return this.containers.get(container)?.get(key);
  }
}
