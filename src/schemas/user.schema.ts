import { z } from "zod";
import { ROLES } from "../db/schema.js";

export const userIdSchema = z.object({
    id: z.coerce.number().int().positive("Invalid user ID"),
});

export const roleChangeSchema = z.object({
    role: z.enum(ROLES, { errorMap: () => ({ message: `Role must be one of ${ROLES.join(", ")}` }) }),
});

export type RoleChangeInput = z.infer<typeof roleChangeSchema>;
