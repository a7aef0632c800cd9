import type { TokenPayload } from "../utils/jwt.js";
import { ApiError } from "../utils/apiError.js";

export type Actor = TokenPayload;

export function isAdmin(actor: Actor): boolean {
    return actor.role === "admin";
}

export function assertAdmin(actor: Actor, message = "Admin access required"): void {
    if (!isAdmin(actor)) {
        throw ApiError.forbidden(message);
    }
}
