import { z } from "zod";
import {
    PRIORITIES,
    canonicalPriority,
    canonicalProblemType,
} from "../utils/labels.js";

const requiredText = (label: string, max: number) =>
    z
        .string({ required_error: `${label} is required`, invalid_type_error: `${label} must be text` })
        .trim()
        .min(1, `${label} is required`)
        .max(max);

// Multipart bodies send "" for untouched fields
const optionalCoordinate = (min: number, max: number) =>
    z.preprocess(
        (value) => (value === "" || value === null ? undefined : value),
        z.coerce.number().min(min).max(max).optional()
    );

export const reportDraftSchema = z.object({
    reporterName: z
        .string()
        .trim()
        .max(255)
        .optional()
        .transform((value) => value || undefined),
    problemType: requiredText("Problem type", 200)
        .transform(canonicalProblemType)
        .pipe(z.string().min(1, "Problem type is required").max(100)),
    location: requiredText("Location", 1000),
    issueDescription: requiredText("Issue description", 5000),
    reportedDate: requiredText("Reported date", 50),
    priority: requiredText("Priority", 100).transform((value, ctx) => {
        const priority = canonicalPriority(value);
        if (!priority) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `Priority must be one of ${PRIORITIES.join(", ")}`,
            });
            return z.NEVER;
        }
        return priority;
    }),
    latitude: optionalCoordinate(-90, 90),
    longitude: optionalCoordinate(-180, 180),
});

export const reportScopeSchema = z.object({
    scope: z.enum(["all", "mine"]).default("mine"),
});

export const reportIdSchema = z.object({
    id: z.coerce.number().int().positive("Invalid report ID"),
});

export const statusChangeSchema = z.object({
    status: z.string().trim().min(1, "Status is required"),
});

export type ReportDraftInput = z.input<typeof reportDraftSchema>;
export type ReportDraft = z.output<typeof reportDraftSchema>;
export type ReportScope = z.infer<typeof reportScopeSchema>["scope"];
