import { z, type ZodError, type ZodTypeAny } from "zod";
import { ApiError } from "./apiError.js";

export function formatZodError(error: ZodError): string {
    const { formErrors, fieldErrors } = error.flatten();
    const fields = Object.entries(fieldErrors).map(
        ([field, msgs]) => `${field}: ${(msgs ?? []).join(", ")}`
    );
    return [...formErrors, ...fields].join("; ");
}

/** Parse service input, turning schema failures into a VALIDATION_ERROR. */
export function parseInput<T extends ZodTypeAny>(schema: T, data: unknown): z.output<T> {
    const result = schema.safeParse(data);
    if (!result.success) {
        throw ApiError.validation(`Validation failed: ${formatZodError(result.error)}`);
    }
    return result.data;
}
