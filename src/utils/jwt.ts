import jwt from "jsonwebtoken";
import { z } from "zod";
import { env } from "../config/env.js";
import { ROLES } from "../db/schema.js";

const tokenPayloadSchema = z.object({
    userId: z.number().int().positive(),
    role: z.enum(ROLES),
});

/** The identity every service call acts as. */
export type TokenPayload = z.infer<typeof tokenPayloadSchema>;

export function generateAccessToken(payload: TokenPayload): string {
    return jwt.sign({ userId: payload.userId, role: payload.role }, env.JWT_SECRET, {
        expiresIn: env.JWT_EXPIRES_IN_SECONDS,
    });
}

export function verifyAccessToken(token: string): TokenPayload {
    return tokenPayloadSchema.parse(jwt.verify(token, env.JWT_SECRET));
}
