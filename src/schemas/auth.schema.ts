import { z } from "zod";

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
export const PHONE_PATTERN = /^\+?1?\d{9,15}$/;

export const registerSchema = z
    .object({
        username: z.string().trim().min(2, "Username must be at least 2 characters").max(100),
        email: z
            .string()
            .trim()
            .regex(EMAIL_PATTERN, "Invalid email address")
            .max(255)
            .transform((email) => email.toLowerCase()),
        phone: z
            .string()
            .trim()
            .optional()
            .transform((phone) => phone || undefined)
            .pipe(z.string().regex(PHONE_PATTERN, "Invalid phone number").optional()),
        password: z.string().min(6, "Password must be at least 6 characters").max(128),
        confirmPassword: z.string(),
    })
    .refine((input) => input.password === input.confirmPassword, {
        message: "Passwords do not match",
        path: ["confirmPassword"],
    });

export const loginSchema = z.object({
    email: z
        .string()
        .trim()
        .min(1, "Email is required")
        .transform((email) => email.toLowerCase()),
    password: z.string().min(1, "Password is required"),
});

export type RegisterInput = z.input<typeof registerSchema>;
export type LoginInput = z.input<typeof loginSchema>;
