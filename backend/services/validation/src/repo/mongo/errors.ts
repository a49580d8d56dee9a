// backend/services/validation/src/repo/mongo/errors.ts
/** E11000 from the driver, surfaced through mongoose unchanged. */
export function isDuplicateKeyError(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === 11000
  );
}
