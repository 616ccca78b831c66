const MiB = 1024 * 1024;
const GiB = 1024 * MiB;

export type SizeBucket = "0-1MB" | "1-10MB" | "10-100MB" | "100MB-1GB" | "1GB+";
export type SizeBucketOrUnknown = SizeBucket | "unknown";

export interface SizeBucketDefinition {
  name: SizeBucket;
  /** Exclusive upper bound in bytes. */
  upperBound: number;
}

export const SIZE_BUCKETS: readonly SizeBucketDefinition[] = [
  { name: "0-1MB", upperBound: MiB },
  { name: "1-10MB", upperBound: 10 * MiB },
  { name: "10-100MB", upperBound: 100 * MiB },
  { name: "100MB-1GB", upperBound: GiB },
  { name: "1GB+", upperBound: Number.POSITIVE_INFINITY },
];

export const SIZE_BUCKET_ORDER: readonly SizeBucketOrUnknown[] = [...SIZE_BUCKETS.map((bucket) => bucket.name), "unknown"];

export function bucketFileSize(size: number | null | undefined): SizeBucketOrUnknown {
  if (typeof size !== "number" || !Number.isFinite(size) || size < 0) {
    return "unknown";
  }
  const bucket = SIZE_BUCKETS.find((candidate) => size < candidate.upperBound);
  return bucket?.name ?? "1GB+";
}
