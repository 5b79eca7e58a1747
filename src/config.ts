import { z } from "zod";
import { isUintBitSize, isUintLiteral, maxUint, uintType, type UintBitSize } from "../runtime/index.js";
import { LOG_LEVELS } from "./logger.js";

/**
 * Configuration schema with validation
 */
const configSchema = z
  .object({
    // Width of the counter value in bits (uint8 ... uint256)
    bits: z
      .number()
      .int()
      .refine((bits): bits is UintBitSize => isUintBitSize(bits), {
        message: "must be a multiple of 8 between 8 and 256",
      }),
    initialValue: z
      .string()
      .refine(isUintLiteral, { message: "must be a decimal or 0x-prefixed hex integer" })
      .transform((value) => BigInt(value)),
    logLevel: z.enum(LOG_LEVELS),
  })
  .superRefine((config, ctx) => {
    // Fields that failed their own checks arrive unrefined; only compare valid ones
    if (typeof config.initialValue !== "bigint" || !isUintBitSize(config.bits)) return;
    if (config.initialValue > maxUint(config.bits)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["initialValue"],
        message: `${config.initialValue} does not fit ${uintType(config.bits)}`,
      });
    }
  });

export type Config = z.infer<typeof configSchema>;

/**
 * Parse environment variables into configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    bits: env["COUNTER_BITS"] ? Number(env["COUNTER_BITS"]) : 256,
    initialValue: env["COUNTER_INITIAL_VALUE"] || "0",
    logLevel: env["LOG_LEVEL"] || "info",
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join("\n")}`);
  }

  return result.data;
}

let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing
export function resetConfig(): void {
  configInstance = null;
}
