import { count, eq, sql } from "drizzle-orm";
import type { PgTable } from "drizzle-orm/pg-core";
import { db } from "../../src/db/index.js";
import { users } from "../../src/db/schema.js";
import { registerUser, type PublicUser } from "../../src/services/user.service.js";
import type { Actor } from "../../src/services/access.js";
import type { ReportDraftInput } from "../../src/schemas/report.schema.js";

export const PASSWORD = "test-password";

export async function resetDatabase(): Promise<void> {
    await db.execute(sql`ALTER TABLE audit_logs DROP CONSTRAINT IF EXISTS audit_logs_reject_writes`);
    await db.execute(sql`TRUNCATE audit_logs, notifications, reports, users RESTART IDENTITY CASCADE`);
}

/** Makes every audit insert fail until the next resetDatabase(). */
export async function rejectAuditWrites(): Promise<void> {
    await db.execute(sql`ALTER TABLE audit_logs ADD CONSTRAINT audit_logs_reject_writes CHECK (false) NOT VALID`);
}

export async function tableCount(table: PgTable): Promise<number> {
    const [row] = await db.select({ n: count() }).from(table);
    return row.n;
}

export function actorOf(user: PublicUser): Actor {
    return { userId: user.id, role: user.role };
}

export async function createUser(username = "alice"): Promise<PublicUser> {
    return registerUser({
        username,
        email: `${username}@example.com`,
        password: PASSWORD,
        confirmPassword: PASSWORD,
    });
}

export async function createAdmin(username = "admin"): Promise<PublicUser> {
    const user = await createUser(username);
    await db.update(users).set({ role: "admin" }).where(eq(users.id, user.id));
    return { ...user, role: "admin" };
}

export function reportDraft(overrides: Partial<ReportDraftInput> = {}): ReportDraftInput {
    return {
        problemType: "Road",
        location: "Main St",
        issueDescription: "pothole",
        reportedDate: "2024-01-01",
        priority: "High",
        ...overrides,
    };
}
