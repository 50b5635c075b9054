import { join, resolve } from "node:path";
import { describe, expect, it } from "vitest";
import { InvalidTransferPathError } from "../core/errors.js";
import {
  baseName,
  isFolderMarker,
  joinStoragePath,
  localPathForKey,
  normalizeStoragePath,
  storagePrefix,
} from "../core/paths.js";

describe("normalizeStoragePath", () => {
  it("keeps a clean key unchanged", () => {
    expect(normalizeStoragePath("my_storage_dir/first_subdir/f1")).toBe(
      "my_storage_dir/first_subdir/f1",
    );
  });

  it("strips leading, trailing and repeated separators", () => {
    expect(normalizeStoragePath("/my_storage_dir//first_subdir/f1/")).toBe(
      "my_storage_dir/first_subdir/f1",
    );
  });

  it("converts backslashes and drops '.' segments", () => {
    expect(normalizeStoragePath(".\\reports\\.\\q1.csv")).toBe(
      "reports/q1.csv",
    );
  });

  it("rejects an empty path", () => {
    expect(() => normalizeStoragePath("//")).toThrow(InvalidTransferPathError);
    expect(() => normalizeStoragePath("")).toThrow("Storage path is empty");
  });

  it("rejects '..' segments", () => {
    expect(() => normalizeStoragePath("a/../../etc/passwd")).toThrow(
      "Storage path must not contain '..' segments",
    );
  });
});

describe("joinStoragePath", () => {
  it("joins a prefix and a relative path", () => {
    expect(joinStoragePath("my_storage_dir/", "first_subdir/f1")).toBe(
      "my_storage_dir/first_subdir/f1",
    );
  });

  it("skips empty parts", () => {
    expect(joinStoragePath("", "f2")).toBe("f2");
  });
});

describe("storagePrefix", () => {
  it("returns an empty prefix for the container root", () => {
    expect(storagePrefix("")).toBe("");
    expect(storagePrefix("/")).toBe("");
    expect(storagePrefix(".")).toBe("");
  });

  it("adds a single trailing slash", () => {
    expect(storagePrefix("my_storage_dir")).toBe("my_storage_dir/");
    expect(storagePrefix("/my_storage_dir/")).toBe("my_storage_dir/");
  });
});

describe("localPathForKey", () => {
  it("maps a key under the storage directory into the local directory", () => {
    expect(
      localPathForKey("/tmp/out", "my_storage_dir", "my_storage_dir/a/f1"),
    ).toBe(resolve(join("/tmp/out", "a", "f1")));
  });

  it("maps keys from the container root", () => {
    expect(localPathForKey("/tmp/out", "", "f2")).toBe(
      resolve(join("/tmp/out", "f2")),
    );
  });

  it("rejects keys outside the storage directory", () => {
    expect(() =>
      localPathForKey("/tmp/out", "my_storage_dir", "other/f1"),
    ).toThrow("Key other/f1 is not under storage directory my_storage_dir");
  });

  it("rejects keys that climb out of the destination", () => {
    expect(() =>
      localPathForKey("/tmp/out", "dir", "dir/../../escape"),
    ).toThrow(InvalidTransferPathError);
  });
});

describe("isFolderMarker", () => {
  it("detects keys ending in a slash", () => {
    expect(isFolderMarker("my_storage_dir/")).toBe(true);
    expect(isFolderMarker("my_storage_dir/f1")).toBe(false);
  });
});

describe("baseName", () => {
  it("returns the last segment of a key or path", () => {
    expect(baseName("my_storage_dir/first_subdir/f1")).toBe("f1");
    expect(baseName("C:\\data\\f3")).toBe("f3");
    expect(baseName("f4")).toBe("f4");
  });
});
