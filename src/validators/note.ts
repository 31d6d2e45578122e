import { z } from "zod";

export const noteSchema = z.object({
  message: z
    .string({ message: "Message is required." })
    .trim()
    .min(1, "Message is required.")
    .max(280, "Message is too long.")
});
