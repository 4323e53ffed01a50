import { z } from "zod";
import { ValidationLevel } from "../core/validation-level.js";

const levelMask = z.number().int().min(ValidationLevel.None).max(ValidationLevel.All);
const levelNames = z.union([z.string(), z.array(z.string())]);

function isLoggerLike(value: unknown): boolean {
  if (typeof value !== "object" || value === null) return false;
  return (
    "info" in value &&
    typeof value.info === "function" &&
    "warn" in value &&
    typeof value.warn === "function" &&
    "error" in value &&
    typeof value.error === "function"
  );
}

export const validationLoggerOptionsSchema = z.object({
  // Mask, or level names such as "warning,error"
  enabledLevels: z.union([levelMask, levelNames]).optional(),

  // Diagnostics
  logger: z
    .unknown()
    .refine((v) => v === undefined || isLoggerLike(v), "must implement info, warn and error")
    .optional(),
});
