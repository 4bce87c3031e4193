import { z } from "zod";
import { GateSchema } from "./zod-schema.gate.js";

const TelegramSchema = z
  .object({
    botToken: z.string().min(1).optional(),
  })
  .strict()
  .optional();

const LoggingSchema = z
  .object({
    level: z
      .union([z.literal("debug"), z.literal("info"), z.literal("warn"), z.literal("error")])
      .optional(),
  })
  .strict()
  .optional();

export const JoinGateSchema = z
  .object({
    telegram: TelegramSchema,
    gate: GateSchema,
    logging: LoggingSchema,
  })
  .strict();
