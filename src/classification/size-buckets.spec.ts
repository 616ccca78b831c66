import { describe, expect, it } from "vitest";
import { bucketFileSize, SIZE_BUCKET_ORDER } from "./size-buckets.js";

const MiB = 1024 * 1024;

describe("bucketFileSize", () => {
  it.each([
    [0, "0-1MB"],
    [MiB - 1, "0-1MB"],
    [MiB, "1-10MB"],
    [10 * MiB, "10-100MB"],
    [100 * MiB - 1, "10-100MB"],
    [100 * MiB, "100MB-1GB"],
    [1024 * MiB, "1GB+"],
    [5 * 1024 * MiB, "1GB+"],
  ])("puts %d bytes in %s", (size, expected) => {
    expect(bucketFileSize(size)).toBe(expected);
  });

  it("returns unknown for missing or negative sizes", () => {
    expect(bucketFileSize(null)).toBe("unknown");
    expect(bucketFileSize(undefined)).toBe("unknown");
    expect(bucketFileSize(-1)).toBe("unknown");
  });

  it("orders buckets from smallest to unknown", () => {
    expect(SIZE_BUCKET_ORDER).toEqual(["0-1MB", "1-10MB", "10-100MB", "100MB-1GB", "1GB+", "unknown"]);
  });
});
