// backend/services/validation/src/serviceName.ts
export const SERVICE_NAME = "validation" as const;
