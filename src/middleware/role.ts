import { Request, Response, NextFunction } from "express";
import { ApiError } from "../utils/apiError.js";
import type { Role } from "../db/schema.js";

export function requireRole(...roles: Role[]) {
    return (req: Request, _res: Response, next: NextFunction): void => {
        if (!req.user) {
            return next(ApiError.unauthorized("Authentication required"));
        }

        if (!roles.includes(req.user.role)) {
            return next(ApiError.forbidden("Insufficient permissions"));
        }

        next();
    };
}
