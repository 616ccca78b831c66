/**
 * Label value for an HTTP status code. Transport failures and the no-agreement
 * sentinel (any non-positive or missing code) are "failure".
 */
export function classifyHttpResponseCode(statusCode: number | null): string {
  if (statusCode === null || !Number.isFinite(statusCode) || statusCode <= 0) return "failure";
  if (statusCode === 200) return "200";
  if (statusCode === 500) return "500";
  if (statusCode >= 200 && statusCode < 300) return "2xxSuccess";
  if (statusCode >= 300 && statusCode < 400) return "3xxRedirect";
  if (statusCode >= 400 && statusCode < 500) return "4xxClientError";
  if (statusCode >= 500 && statusCode < 600) return "5xxServerError";
  return "otherHttpStatusCodes";
}
