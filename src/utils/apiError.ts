export type ErrorCode =
    | "VALIDATION_ERROR"
    | "UNAUTHORIZED"
    | "FORBIDDEN"
    | "SELF_MODIFICATION"
    | "NOT_FOUND"
    | "CONFLICT"
    | "INVALID_TRANSITION"
    | "PAYLOAD_TOO_LARGE"
    | "INTERNAL";

export class ApiError extends Error {
    public readonly statusCode: number;
    public readonly code: ErrorCode;

    constructor(statusCode: number, message: string, code: ErrorCode) {
        super(message);
        this.statusCode = statusCode;
        this.code = code;
        Object.setPrototypeOf(this, ApiError.prototype);
    }

    static validation(message: string) {
        return new ApiError(400, message, "VALIDATION_ERROR");
    }

    static unauthorized(message: string = "Unauthorized") {
        return new ApiError(401, message, "UNAUTHORIZED");
    }

    static forbidden(message: string = "Forbidden") {
        return new ApiError(403, message, "FORBIDDEN");
    }

    static selfModification(message: string) {
        return new ApiError(403, message, "SELF_MODIFICATION");
    }

    static notFound(message: string = "Not found") {
        return new ApiError(404, message, "NOT_FOUND");
    }

    static conflict(message: string) {
        return new ApiError(409, message, "CONFLICT");
    }

    static invalidTransition(message: string) {
        return new ApiError(422, message, "INVALID_TRANSITION");
    }

    static payloadTooLarge(message: string) {
        return new ApiError(413, message, "PAYLOAD_TOO_LARGE");
    }
}
