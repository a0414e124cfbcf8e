// src/schemas/createEvent.schema.ts
import { z } from "zod";

const MAX_INPUT_LENGTH = 500;

export const CreateEventBody = z.object({
  text: z
    .string()
    .transform((s) => s.replace(/\s+/g, " ").trim().slice(0, MAX_INPUT_LENGTH).trim())
    .pipe(z.string().min(3, "Event description is too short")),
  app: z.enum(["calendar", "fantastical"]).optional(),
  offline: z.boolean().default(false),
});

export type CreateEventBody = z.infer<typeof CreateEventBody>;

export const CliOptions = z.object({
  app: z.enum(["calendar", "fantastical"]).optional(),
  offline: z.boolean().default(false),
  help: z.boolean().default(false),
});
