import { eq, count, sql } from "drizzle-orm";
import { db } from "../db/index.js";
import { reports } from "../db/schema.js";
import type { ReportStatus } from "../utils/labels.js";

export interface GlobalStats {
    total: number;
    pending: number;
    inProgress: number;
    resolved: number;
}

export interface UserStats {
    myReports: number;
}

const countStatus = (status: ReportStatus) =>
    sql<number>`count(*) filter (where ${reports.status} = ${status})`.mapWith(Number);

// Re-scans on every call; nothing is cached.
export async function globalStats(): Promise<GlobalStats> {
    const [row] = await db
        .select({
            total: count(),
            pending: countStatus("Pending"),
            inProgress: countStatus("In Progress"),
            resolved: countStatus("Resolved"),
        })
        .from(reports);

    return row;
}

export async function userStats(userId: number): Promise<UserStats> {
    const [row] = await db
        .select({ myReports: count() })
        .from(reports)
        .where(eq(reports.userId, userId));

    return row;
}
