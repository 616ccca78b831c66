export type Outcome = "success" | "failure";

/**
 * Single success rule for every count in the system: a check succeeded only
 * when it was reported available with a 2xx status code.
 */
export function classify(status: string | null | undefined, statusCode: number | null | undefined): Outcome {
  if (typeof status !== "string" || typeof statusCode !== "number") {
    return "failure";
  }
  return status.toLowerCase() === "available" && statusCode >= 200 && statusCode < 300 ? "success" : "failure";
}

export function isSuccess(status: string | null | undefined, statusCode: number | null | undefined): boolean {
  return classify(status, statusCode) === "success";
}

const RATE_PRECISION = 1_000_000;

/**
 * success / (success + failure), rounded to 6 decimals.
 * `null` means nothing was tested, which is different from a 0 rate.
 */
export function successRate(successCount: number, failureCount: number): number | null {
  const total = successCount + failureCount;
  if (total === 0) {
    return null;
  }
  return Math.round((successCount / total) * RATE_PRECISION) / RATE_PRECISION;
}
