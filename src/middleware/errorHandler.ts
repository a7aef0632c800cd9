import { Request, Response, NextFunction } from "express";
import multer from "multer";
import { ZodError } from "zod";
import { ApiError } from "../utils/apiError.js";
import { env } from "../config/env.js";
import { formatZodError } from "../utils/validation.js";

function toApiError(err: Error): ApiError | undefined {
    if (err instanceof ApiError) return err;

    if (err instanceof ZodError) {
        return ApiError.validation(`Validation failed: ${formatZodError(err)}`);
    }

    if (err instanceof multer.MulterError) {
        if (err.code === "LIMIT_FILE_SIZE") {
            return ApiError.payloadTooLarge(`File size exceeds the limit (${env.MAX_PHOTO_BYTES} bytes)`);
        }
        return ApiError.validation(err.message);
    }

    // Body over the express.json() / urlencoded() size limit
    if ("type" in err && err.type === "entity.too.large") {
        return ApiError.payloadTooLarge("Request body too large");
    }

    // Malformed JSON from express.json()
    if (err instanceof SyntaxError && "body" in err) {
        return ApiError.validation("Malformed JSON body");
    }

    return undefined;
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
    const apiError = toApiError(err);

    if (apiError) {
        res.status(apiError.statusCode).json({
            success: false,
            message: apiError.message,
            code: apiError.code,
        });
        return;
    }

    if (env.NODE_ENV !== "test") {
        console.error("❌ Error:", err);
    }

    res.status(500).json({
        success: false,
        message: env.NODE_ENV === "production" ? "Internal server error" : err.message,
        code: "INTERNAL",
    });
}
