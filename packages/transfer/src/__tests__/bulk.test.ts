import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MemoryObjectStore } from "../adapters/memory/index.js";
import {
  BulkTransfer,
  bulkDownloadFiles,
  bulkUploadFiles,
} from "../core/bulk.js";
import {
  BulkTransferError,
  InvalidTransferPathError,
  ObjectNotFoundError,
  TransferConfigError,
} from "../core/errors.js";
import type {
  NativeTransferOutcome,
  StorageTransferPath,
  TransferProgress,
} from "../core/types.js";

function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * Memory store with a native bulk upload path
 */
class NativeMemoryStore extends MemoryObjectStore {
  nativeCalls: number[] = [];
  nativeKeys: string[][] = [];
  failNative = false;

  async uploadMany(
    container: string,
    paths: StorageTransferPath[],
    concurrency: number,
  ): Promise<NativeTransferOutcome[]> {
    this.nativeCalls.push(concurrency);
    this.nativeKeys.push(paths.map((path) => path.storagePath));
    if (this.failNative) {
      throw new Error("transfer manager unavailable");
    }

    const outcomes: NativeTransferOutcome[] = [];
    for (const path of paths) {
      try {
        const bytes = await this.uploadFile(
          container,
          path.localPath,
          path.storagePath,
        );
        outcomes.push({ status: "succeeded", bytes });
      } catch (error) {
        outcomes.push({
          status: "failed",
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
    }
    return outcomes;
  }
}

describe("BulkTransfer", () => {
  let store: MemoryObjectStore;
  let bulk: BulkTransfer;
  let tempDir: string;

  beforeEach(async () => {
    store = new MemoryObjectStore();
    bulk = new BulkTransfer(store, { concurrency: 4 });
    tempDir = await mkdtemp(join(tmpdir(), "bulk-test-"));
    await store.createContainer("test-bucket");
  });

  afterEach(async () => {
    await bulk.close();
    await rm(tempDir, { recursive: true, force: true });
  });

  async function createTestDir(): Promise<string> {
    const dir = join(tempDir, "test_dir");
    await mkdir(join(dir, "first_subdir", "second_subdir"), { recursive: true });
    await writeFile(join(dir, "f1"), "one");
    await writeFile(join(dir, "first_subdir", "f2"), "two!");
    await writeFile(join(dir, "first_subdir", "second_subdir", "f3"), "three");
    return dir;
  }

  describe("constructor", () => {
    it("rejects an invalid worker count", () => {
      expect(() => new BulkTransfer(store, { concurrency: 0 })).toThrow(
        TransferConfigError,
      );
    });
  });

  describe("uploadDirectory and downloadDirectory", () => {
    it("uploads a tree under a storage directory", async () => {
      const dir = await createTestDir();

      const report = await bulk.uploadDirectory("test-bucket", dir, "my_storage_dir");

      expect(report.direction).toBe("upload");
      expect(report.total).toBe(3);
      expect(report.succeeded).toBe(3);
      expect(report.failed).toBe(0);
      expect(report.bytes).toBe(12);
      expect(await store.listKeys("test-bucket")).toEqual([
        "my_storage_dir/f1",
        "my_storage_dir/first_subdir/f2",
        "my_storage_dir/first_subdir/second_subdir/f3",
      ]);
    });

    it("uploads to the container root when no storage directory is given", async () => {
      const dir = await createTestDir();

      await bulk.uploadDirectory("test-bucket", dir);

      expect(await store.listKeys("test-bucket")).toEqual([
        "f1",
        "first_subdir/f2",
        "first_subdir/second_subdir/f3",
      ]);
    });

    it("downloads a tree back with the same structure", async () => {
      const dir = await createTestDir();
      await bulk.uploadDirectory("test-bucket", dir, "my_storage_dir");
      const out = join(tempDir, "out");

      const report = await bulk.downloadDirectory(
        "test-bucket",
        "my_storage_dir",
        out,
      );

      expect(report.succeeded).toBe(3);
      expect(await readFile(join(out, "f1"), "utf8")).toBe("one");
      expect(await readFile(join(out, "first_subdir", "f2"), "utf8")).toBe("two!");
      expect(
        await readFile(join(out, "first_subdir", "second_subdir", "f3"), "utf8"),
      ).toBe("three");
    });

    it("downloads only keys under the storage directory and skips folder markers", async () => {
      store.put("test-bucket", "my_storage_dir/", "");
      store.put("test-bucket", "my_storage_dir/a/f1", "inside");
      store.put("test-bucket", "my_storage_dir_other/f2", "outside");
      const out = join(tempDir, "out");

      const report = await bulk.downloadDirectory(
        "test-bucket",
        "my_storage_dir",
        out,
      );

      expect(report.total).toBe(1);
      expect(report.results[0]?.path.storagePath).toBe("my_storage_dir/a/f1");
      expect(await readFile(join(out, "a", "f1"), "utf8")).toBe("inside");
    });

    it("downloads listed keys exactly as the store returned them", async () => {
      store.put("test-bucket", "data/a//x.txt", "double");
      const out = join(tempDir, "out");

      const report = await bulk.downloadDirectory("test-bucket", "data", out, {
        throwOnError: false,
      });

      expect(report.failed).toBe(0);
      expect(report.results[0]?.path.storagePath).toBe("data/a//x.txt");
      expect(await readFile(join(out, "a", "x.txt"), "utf8")).toBe("double");
    });

    it("fails only the keys that would escape the target directory", async () => {
      store.put("test-bucket", "data/ok.txt", "fine");
      store.put("test-bucket", "data/../evil.txt", "nope");
      const out = join(tempDir, "out");

      const report = await bulk.downloadDirectory("test-bucket", "data", out, {
        throwOnError: false,
      });

      expect(report.total).toBe(2);
      expect(report.succeeded).toBe(1);
      expect(report.failed).toBe(1);
      expect(await readFile(join(out, "ok.txt"), "utf8")).toBe("fine");

      const bad = report.results.find((r) => r.status === "failed");
      expect(bad?.path.storagePath).toBe("data/../evil.txt");
      if (bad?.status === "failed") {
        expect(bad.error).toBeInstanceOf(InvalidTransferPathError);
      }
    });
  });

  describe("upload and download", () => {
    it("accepts a single path", async () => {
      const file = join(tempDir, "f1");
      await writeFile(file, "single");

      const report = await bulk.upload("test-bucket", {
        localPath: file,
        storagePath: "/a//b/f1",
      });

      expect(report.total).toBe(1);
      expect(store.get("test-bucket", "a/b/f1")?.toString()).toBe("single");
    });

    it("downloads keys with repeated slashes unchanged", async () => {
      store.put("test-bucket", "data/a//x.txt", "double");
      const target = join(tempDir, "x.txt");

      const report = await bulk.download("test-bucket", {
        storagePath: "data/a//x.txt",
        localPath: target,
      });

      expect(report.succeeded).toBe(1);
      expect(await readFile(target, "utf8")).toBe("double");
    });

    it("fails invalid destinations per item and uploads the rest", async () => {
      const good = join(tempDir, "good");
      await writeFile(good, "ok");
      const events: TransferProgress[] = [];

      const report = await bulk.upload(
        "test-bucket",
        [
          { localPath: good, storagePath: "good" },
          { localPath: good, storagePath: "/" },
          { localPath: good, storagePath: "a/../b" },
        ],
        { throwOnError: false, onProgress: (p) => events.push(p) },
      );

      expect(report.total).toBe(3);
      expect(report.succeeded).toBe(1);
      expect(report.failed).toBe(2);
      expect(events).toHaveLength(3);
      expect(await store.listKeys("test-bucket")).toEqual(["good"]);

      const [, empty, traversal] = report.results;
      expect(empty?.path.storagePath).toBe("/");
      if (empty?.status === "failed") {
        expect(empty.error).toBeInstanceOf(InvalidTransferPathError);
        expect(empty.error.message).toBe("Storage path is empty");
      }
      expect(traversal?.status).toBe("failed");
    });

    it("throws BulkTransferError for an invalid destination by default", async () => {
      const good = join(tempDir, "good");
      await writeFile(good, "ok");

      const error = await bulk
        .upload("test-bucket", [
          { localPath: good, storagePath: "good" },
          { localPath: good, storagePath: "" },
        ])
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BulkTransferError);
      expect(store.get("test-bucket", "good")?.toString()).toBe("ok");
    });

    it("returns an empty report for an empty list", async () => {
      const report = await bulk.upload("test-bucket", []);

      expect(report.total).toBe(0);
      expect(report.succeeded).toBe(0);
      expect(report.failed).toBe(0);
      expect(report.bytes).toBe(0);
      expect(report.results).toEqual([]);
    });

    it("throws BulkTransferError when a local file is missing", async () => {
      const good = join(tempDir, "good");
      await writeFile(good, "ok");

      const error = await bulk
        .upload("test-bucket", [
          { localPath: good, storagePath: "good" },
          { localPath: join(tempDir, "missing"), storagePath: "missing" },
        ])
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BulkTransferError);
      if (!(error instanceof BulkTransferError)) return;
      expect(error.message).toBe(
        "Bulk upload to test-bucket completed with 1 of 2 items failed",
      );
      expect(error.failures).toHaveLength(1);
      expect(error.failures[0]?.path.storagePath).toBe("missing");
      expect(error.report.succeeded).toBe(1);
      expect(store.get("test-bucket", "good")?.toString()).toBe("ok");
    });

    it("returns failures in the report when throwOnError is false", async () => {
      const report = await bulk.download(
        "test-bucket",
        [{ storagePath: "nope", localPath: join(tempDir, "nope") }],
        { throwOnError: false },
      );

      expect(report.failed).toBe(1);
      const [result] = report.results;
      expect(result?.status).toBe("failed");
      if (result?.status === "failed") {
        expect(result.error).toBeInstanceOf(ObjectNotFoundError);
      }
    });

    it("creates parent directories for downloads", async () => {
      store.put("test-bucket", "x/y/f1", "deep");
      const target = join(tempDir, "a", "b", "c", "f1");

      await bulk.download("test-bucket", [{ storagePath: "x/y/f1", localPath: target }]);

      expect(await readFile(target, "utf8")).toBe("deep");
    });

    it("reports progress after every item", async () => {
      for (const name of ["f1", "f2", "f3"]) {
        store.put("test-bucket", name, name);
      }
      const events: TransferProgress[] = [];

      await bulk.downloadFiles("test-bucket", ["f1", "f2", "f3"], tempDir, {
        onProgress: (progress) => events.push(progress),
      });

      expect(events).toHaveLength(3);
      expect(events.map((e) => e.completed)).toEqual([1, 2, 3]);
      expect(events.every((e) => e.total === 3 && e.failed === 0)).toBe(true);
    });

    it("keeps results in input order", async () => {
      const paths: StorageTransferPath[] = [];
      for (let i = 0; i < 10; i++) {
        const file = join(tempDir, `f${i}`);
        await writeFile(file, "x".repeat(i));
        paths.push({ localPath: file, storagePath: `k${i}` });
      }

      const report = await bulk.upload("test-bucket", paths, { concurrency: 3 });

      expect(report.results.map((r) => r.path.storagePath)).toEqual(
        paths.map((p) => p.storagePath),
      );
      expect(report.bytes).toBe(45);
    });
  });

  describe("uploadFiles and downloadFiles", () => {
    it("uses base names for keys and local files", async () => {
      const a = join(tempDir, "nested", "a.txt");
      await mkdir(join(tempDir, "nested"));
      await writeFile(a, "alpha");

      await bulk.uploadFiles("test-bucket", [a], { storageDir: "docs" });
      expect(await store.listKeys("test-bucket")).toEqual(["docs/a.txt"]);

      const out = join(tempDir, "out");
      await bulk.downloadFiles("test-bucket", ["docs/a.txt"], out);
      expect(await readFile(join(out, "a.txt"), "utf8")).toBe("alpha");
    });
  });

  describe("native bulk upload", () => {
    let native: NativeMemoryStore;
    let logger: ReturnType<typeof createMockLogger>;

    beforeEach(async () => {
      native = new NativeMemoryStore();
      logger = createMockLogger();
      await native.createContainer("test-bucket");
    });

    it("routes uploads through uploadMany when requested", async () => {
      const dir = await createTestDir();
      const client = new BulkTransfer(native, { concurrency: 8, logger });

      const report = await client.uploadDirectory("test-bucket", dir, "", {
        useTransferManager: true,
      });

      expect(native.nativeCalls).toEqual([8]);
      expect(report.succeeded).toBe(3);
      expect(report.bytes).toBe(12);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it("ignores uploadMany unless requested", async () => {
      const dir = await createTestDir();
      const client = new BulkTransfer(native, { logger });

      await client.uploadDirectory("test-bucket", dir);

      expect(native.nativeCalls).toEqual([]);
      expect(await native.listKeys("test-bucket")).toHaveLength(3);
    });

    it("falls back to the worker pool when uploadMany fails", async () => {
      native.failNative = true;
      const dir = await createTestDir();
      const client = new BulkTransfer(native, { logger });

      const report = await client.uploadDirectory("test-bucket", dir, "", {
        useTransferManager: true,
      });

      expect(native.nativeCalls).toEqual([50]);
      expect(report.succeeded).toBe(3);
      expect(await native.listKeys("test-bucket")).toHaveLength(3);
      expect(logger.warn).toHaveBeenCalledWith(
        {
          provider: "memory",
          container: "test-bucket",
          error: "transfer manager unavailable",
        },
        "Native bulk upload failed, falling back to worker pool",
      );
    });

    it("keeps invalid destinations away from uploadMany", async () => {
      const good = join(tempDir, "good");
      await writeFile(good, "ok");
      const client = new BulkTransfer(native, { logger });

      const report = await client.upload(
        "test-bucket",
        [
          { localPath: good, storagePath: "/" },
          { localPath: good, storagePath: "x//good" },
        ],
        { useTransferManager: true, throwOnError: false },
      );

      expect(native.nativeKeys).toEqual([["x/good"]]);
      expect(report.results.map((r) => r.status)).toEqual([
        "failed",
        "succeeded",
      ]);
      expect(report.results.map((r) => r.path.storagePath)).toEqual([
        "/",
        "x/good",
      ]);
      const [invalid] = report.results;
      if (invalid?.status === "failed") {
        expect(invalid.error).toBeInstanceOf(InvalidTransferPathError);
      }
    });

    it("reports per-item native failures", async () => {
      const client = new BulkTransfer(native, { logger });

      const report = await client.upload(
        "test-bucket",
        [{ localPath: join(tempDir, "missing"), storagePath: "missing" }],
        { useTransferManager: true, throwOnError: false },
      );

      expect(report.failed).toBe(1);
      expect(logger.error).toHaveBeenCalledTimes(1);
    });
  });

  describe("container helpers", () => {
    it("lists and empties a container", async () => {
      store.put("test-bucket", "a/f1", "1");
      store.put("test-bucket", "b/f2", "2");

      expect(await bulk.list("test-bucket", "a")).toEqual(["a/f1"]);
      expect(await bulk.exists("test-bucket", "a/f1")).toBe(true);
      expect(await bulk.exists("test-bucket", "/a/f1")).toBe(false);
      expect(await bulk.emptyContainer("test-bucket")).toBe(2);
      expect(await bulk.emptyContainer("test-bucket")).toBe(0);

      await bulk.deleteContainer("test-bucket");
      expect(await bulk.createContainer("test-bucket")).toBe(true);
    });
  });

  describe("logging", () => {
    it("logs items at info level only when verbose", async () => {
      store.put("test-bucket", "f1", "1");
      const quietLogger = createMockLogger();
      const verboseLogger = createMockLogger();
      const target = join(tempDir, "f1");

      await new BulkTransfer(store, { logger: quietLogger }).downloadFiles(
        "test-bucket",
        ["f1"],
        tempDir,
      );
      await new BulkTransfer(store, {
        logger: verboseLogger,
        verbose: true,
      }).downloadFiles("test-bucket", ["f1"], tempDir);

      const transferred = (calls: unknown[][]) =>
        calls.filter((call) => call[1] === "Transferred").length;
      expect(transferred(quietLogger.info.mock.calls)).toBe(0);
      expect(transferred(quietLogger.debug.mock.calls)).toBe(1);
      expect(transferred(verboseLogger.info.mock.calls)).toBe(1);
      expect(await readFile(target, "utf8")).toBe("1");
    });
  });
});

describe("bulkUploadFiles and bulkDownloadFiles", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "bulk-helpers-test-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("moves files through a one-off client and leaves the store open", async () => {
    const store = new MemoryObjectStore();
    await store.createContainer("test-bucket");
    const file = join(tempDir, "report.csv");
    await writeFile(file, "a,b");

    const up = await bulkUploadFiles(store, "test-bucket", [file], {
      concurrency: 2,
    });
    const down = await bulkDownloadFiles(
      store,
      "test-bucket",
      ["report.csv"],
      join(tempDir, "out"),
    );

    expect(up.succeeded).toBe(1);
    expect(down.bytes).toBe(3);
    expect(await store.exists("test-bucket", "report.csv")).toBe(true);
  });
});
