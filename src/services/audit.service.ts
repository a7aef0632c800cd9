import { desc } from "drizzle-orm";
import { db, type Executor } from "../db/index.js";
import { auditLogs, type AuditAction, type AuditTarget } from "../db/schema.js";
import { assertAdmin, type Actor } from "./access.js";

export const DEFAULT_AUDIT_LIMIT = 50;
export const MAX_AUDIT_LIMIT = 100;

export interface AuditInput {
    adminId: number;
    action: AuditAction;
    targetType: AuditTarget;
    targetId?: number | null;
    details?: string | null;
}

/**
 * Append an entry to the admin audit log.
 * Called from the service layer inside the transaction of the action it records.
 */
export async function record(executor: Executor, input: AuditInput) {
    const [entry] = await executor
        .insert(auditLogs)
        .values({
            adminId: input.adminId,
            action: input.action,
            targetType: input.targetType,
            targetId: input.targetId ?? null,
            details: input.details ?? null,
        })
        .returning();

    return entry;
}

export async function listAuditLog(actor: Actor, limit = DEFAULT_AUDIT_LIMIT) {
    assertAdmin(actor);

    const wanted = Number.isFinite(limit) ? Math.trunc(limit) : DEFAULT_AUDIT_LIMIT;
    const capped = Math.min(Math.max(wanted, 1), MAX_AUDIT_LIMIT);
    const logs = await db.query.auditLogs.findMany({
        orderBy: [desc(auditLogs.id)],
        limit: capped,
        with: { admin: { columns: { username: true } } },
    });

    return logs.map((l) => ({
        id: l.id,
        adminId: l.adminId,
        adminName: l.admin?.username ?? "Deleted user",
        action: l.action,
        targetType: l.targetType,
        targetId: l.targetId,
        details: l.details,
        createdAt: l.createdAt,
    }));
}

export async function clearAuditLog(actor: Actor): Promise<number> {
    assertAdmin(actor);

    const removed = await db.delete(auditLogs).returning({ id: auditLogs.id });
    return removed.length;
}
