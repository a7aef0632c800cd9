import { eq, and, desc, count, inArray } from "drizzle-orm";
import { db, type Executor } from "../db/index.js";
import { notifications } from "../db/schema.js";

export const STATUS_UPDATE = "status_update";

/**
 * Append a notification. Pass the open transaction when the notification is a
 * side effect so both commit or roll back together.
 */
export async function notify(
    executor: Executor,
    userId: number,
    reportId: number,
    message: string,
    type: string = STATUS_UPDATE
) {
    const [created] = await executor
        .insert(notifications)
        .values({ userId, reportId, message, type })
        .returning();

    return created;
}

export async function listForUser(userId: number) {
    return db.query.notifications.findMany({
        where: eq(notifications.userId, userId),
        orderBy: [desc(notifications.id)],
    });
}

export async function markAllRead(userId: number): Promise<number> {
    const updated = await db
        .update(notifications)
        .set({ isRead: true })
        .where(and(eq(notifications.userId, userId), eq(notifications.isRead, false)))
        .returning({ id: notifications.id });

    return updated.length;
}

export async function unreadCount(userId: number): Promise<number> {
    const [result] = await db
        .select({ count: count() })
        .from(notifications)
        .where(and(eq(notifications.userId, userId), eq(notifications.isRead, false)));

    return result.count;
}

/**
 * Viewing the list is what marks it read; the caller still sees which ones were new.
 * Only the rows returned are marked, so a notification written meanwhile stays unread.
 */
export async function viewNotifications(userId: number) {
    const list = await listForUser(userId);
    const unseen = list.filter((n) => !n.isRead).map((n) => n.id);

    if (unseen.length > 0) {
        await db
            .update(notifications)
            .set({ isRead: true })
            .where(and(eq(notifications.userId, userId), inArray(notifications.id, unseen)));
    }

    return list;
}
