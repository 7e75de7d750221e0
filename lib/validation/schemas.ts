import { z } from "zod";

export const participantQuerySchema = z.object({
  email: z
    .string({ required_error: "Email is required" })
    .min(1, "Email is required"),
});

export type ParticipantQuery = z.infer<typeof participantQuerySchema>;
