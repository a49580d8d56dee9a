// backend/services/validation/src/repo/memory/clone.ts
/** Stored rows are cloned on the way in and out; callers never share them. */
export const clone = <T>(v: T): T => structuredClone(v);
