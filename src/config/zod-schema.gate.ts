import { z } from "zod";

const ChatIdSchema = z.union([
  z.string().regex(/^-?\d+$/, "Chat id must be numeric"),
  z.number().int(),
]);

export const GateSchema = z
  .object({
    attempts: z.number().int().min(1).max(20).optional(),
    timeoutSeconds: z.number().int().min(10).max(604_800).optional(),
    onWrongAnswer: z.union([z.literal("repeat"), z.literal("reroll")]).optional(),
    removal: z.union([z.literal("kick"), z.literal("ban")]).optional(),
    removalRetries: z.number().int().min(0).max(1).optional(),
    // Telegram treats bans shorter than 30s or longer than 366 days as permanent.
    retryCooldownSeconds: z
      .number()
      .int()
      .min(0)
      .max(31_536_000)
      .refine((value) => value === 0 || value >= 60, "retryCooldownSeconds must be 0 or at least 60")
      .optional(),
    questionsFile: z.string().min(1).optional(),
    groups: z.array(ChatIdSchema).optional(),
    deleteJoinMessages: z.boolean().optional(),
    deleteLeaveMessages: z.boolean().optional(),
    persist: z.boolean().optional(),
  })
  .strict()
  .optional();
