import { Request, Response, NextFunction } from "express";
import { eq } from "drizzle-orm";
import { verifyAccessToken, type TokenPayload } from "../utils/jwt.js";
import { ApiError } from "../utils/apiError.js";
import { db } from "../db/index.js";
import { users } from "../db/schema.js";

// Extend Express Request to include the acting user
declare global {
    namespace Express {
        interface Request {
            user?: TokenPayload;
        }
    }
}

export async function authenticate(req: Request, _res: Response, next: NextFunction): Promise<void> {
    try {
        const authHeader = req.headers.authorization;

        if (!authHeader || !authHeader.startsWith("Bearer ")) {
            throw ApiError.unauthorized("Missing or invalid authorization header");
        }

        const token = authHeader.split(" ")[1];
        const payload = verifyAccessToken(token);

        // Role comes from the row, so a role change applies to tokens already issued
        const dbUser = await db.query.users.findFirst({
            where: eq(users.id, payload.userId),
            columns: { id: true, role: true },
        });

        if (!dbUser) throw ApiError.unauthorized("User not found");

        req.user = { userId: dbUser.id, role: dbUser.role };
        next();
    } catch (error) {
        if (error instanceof ApiError) {
            next(error);
        } else {
            next(ApiError.unauthorized("Invalid or expired token"));
        }
    }
}

/** The authenticated actor; only valid behind `authenticate`. */
export function currentActor(req: Request): TokenPayload {
    if (!req.user) {
        throw ApiError.unauthorized("Authentication required");
    }
    return req.user;
}
