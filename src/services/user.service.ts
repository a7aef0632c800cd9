import bcrypt from "bcryptjs";
import { eq, or, desc } from "drizzle-orm";
import { env } from "../config/env.js";
import { db } from "../db/index.js";
import { users, reports, type Role, type User } from "../db/schema.js";
import { ApiError } from "../utils/apiError.js";
import { generateAccessToken } from "../utils/jwt.js";
import { discardPhoto } from "../utils/photo.js";
import { parseInput } from "../utils/validation.js";
import {
    registerSchema,
    loginSchema,
    type RegisterInput,
    type LoginInput,
} from "../schemas/auth.schema.js";
import { assertAdmin, isAdmin, type Actor } from "./access.js";
import { record } from "./audit.service.js";

export type PublicUser = Omit<User, "passwordHash">;

export function toPublicUser(user: User): PublicUser {
    return {
        id: user.id,
        username: user.username,
        email: user.email,
        phone: user.phone,
        role: user.role,
        createdAt: user.createdAt,
    };
}

function isUniqueViolation(error: unknown): boolean {
    return typeof error === "object" && error !== null && "code" in error && error.code === "23505";
}

// Compared against when the email is unknown, so both paths cost one bcrypt round
let dummyHash: Promise<string> | undefined;
function getDummyHash(): Promise<string> {
    dummyHash ??= bcrypt.hash("placeholder-password", env.BCRYPT_ROUNDS);
    return dummyHash;
}

// ======================================================
// REGISTRATION & LOGIN
// ======================================================
export async function registerUser(input: RegisterInput): Promise<PublicUser> {
    const draft = parseInput(registerSchema, input);

    const existing = await db.query.users.findFirst({
        where: or(eq(users.email, draft.email), eq(users.username, draft.username)),
    });

    if (existing) {
        throw ApiError.conflict(
            existing.email === draft.email ? "Email already registered" : "Username already taken"
        );
    }

    const passwordHash = await bcrypt.hash(draft.password, env.BCRYPT_ROUNDS);

    try {
        const [user] = await db
            .insert(users)
            .values({
                username: draft.username,
                email: draft.email,
                passwordHash,
                phone: draft.phone ?? null,
                role: "user",
            })
            .returning();

        return toPublicUser(user);
    } catch (error) {
        // Lost a race with a concurrent registration
        if (isUniqueViolation(error)) {
            throw ApiError.conflict("Email or username already registered");
        }
        throw error;
    }
}

export async function authenticateUser(input: LoginInput): Promise<PublicUser> {
    const credentials = parseInput(loginSchema, input);

    const user = await db.query.users.findFirst({
        where: eq(users.email, credentials.email),
    });

    const valid = await bcrypt.compare(credentials.password, user?.passwordHash ?? (await getDummyHash()));

    if (!user || !valid) {
        throw ApiError.unauthorized("Invalid credentials");
    }

    return toPublicUser(user);
}

export async function loginUser(input: LoginInput) {
    const user = await authenticateUser(input);
    const accessToken = generateAccessToken({ userId: user.id, role: user.role });

    return { user, accessToken };
}

// Tokens are stateless; logging out only leaves a trace for admins.
export async function logoutUser(actor: Actor): Promise<void> {
    if (!isAdmin(actor)) return;

    await record(db, {
        adminId: actor.userId,
        action: "LOGOUT",
        targetType: "system",
        details: "Admin logged out",
    });
}

export async function getUser(userId: number): Promise<PublicUser> {
    const user = await db.query.users.findFirst({ where: eq(users.id, userId) });
    if (!user) throw ApiError.notFound("User not found");
    return toPublicUser(user);
}

// ======================================================
// ADMINISTRATION
// ======================================================
export async function listUsers(actor: Actor): Promise<PublicUser[]> {
    assertAdmin(actor, "Only admins can list users");

    const rows = await db.query.users.findMany({ orderBy: [desc(users.id)] });
    return rows.map(toPublicUser);
}

export async function setRole(actor: Actor, userId: number, newRole: Role): Promise<PublicUser> {
    assertAdmin(actor, "Only admins can change roles");

    if (userId === actor.userId) {
        throw ApiError.selfModification("You cannot change your own role");
    }

    return db.transaction(async (tx) => {
        const [updated] = await tx
            .update(users)
            .set({ role: newRole })
            .where(eq(users.id, userId))
            .returning();
        if (!updated) throw ApiError.notFound("User not found");

        await record(tx, {
            adminId: actor.userId,
            action: "UPDATE_ROLE",
            targetType: "user",
            targetId: userId,
            details: `Role changed to ${newRole}`,
        });

        return toPublicUser(updated);
    });
}

/** Removes the user and every report they own. */
export async function deleteUser(actor: Actor, userId: number): Promise<void> {
    assertAdmin(actor, "Only admins can delete users");

    if (userId === actor.userId) {
        throw ApiError.selfModification("You cannot delete your own account");
    }

    const removedReports = await db.transaction(async (tx) => {
        const user = await tx.query.users.findFirst({
            where: eq(users.id, userId),
            columns: { id: true, username: true },
        });
        if (!user) throw ApiError.notFound("User not found");

        const owned = await tx
            .delete(reports)
            .where(eq(reports.userId, userId))
            .returning({ id: reports.id, photoRef: reports.photoRef });

        await tx.delete(users).where(eq(users.id, userId));

        const n = owned.length;
        await record(tx, {
            adminId: actor.userId,
            action: "DELETE",
            targetType: "user",
            targetId: userId,
            details: `Deleted user: ${user.username} (cascade: ${n} report${n === 1 ? "" : "s"})`,
        });

        return owned;
    });

    for (const { photoRef } of removedReports) {
        if (photoRef) await discardPhoto(photoRef);
    }
}
