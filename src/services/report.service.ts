import { eq, desc } from "drizzle-orm";
import { db } from "../db/index.js";
import { reports, users, type Report } from "../db/schema.js";
import { ApiError } from "../utils/apiError.js";
import {
    PRIORITIES,
    PROBLEM_TYPES,
    REPORT_STATUSES,
    canonicalStatus,
    type ReportStatus,
} from "../utils/labels.js";
import { compressPhoto, discardPhoto } from "../utils/photo.js";
import { parseInput } from "../utils/validation.js";
import {
    reportDraftSchema,
    type ReportDraftInput,
    type ReportScope,
} from "../schemas/report.schema.js";
import { assertAdmin, isAdmin, type Actor } from "./access.js";
import { notify } from "./notification.service.js";
import { record } from "./audit.service.js";

export interface ReportView {
    id: number;
    userId: number;
    reporterName: string;
    problemType: string;
    location: string;
    issueDescription: string;
    reportedDate: string;
    status: ReportStatus;
    priority: Report["priority"];
    photoRef: string | null;
    latitude: number | null;
    longitude: number | null;
    createdAt: Date;
    username?: string;
}

function toReportView(r: Report): ReportView {
    return {
        id: r.id,
        userId: r.userId,
        reporterName: r.reporterName,
        problemType: r.problemType,
        location: r.location,
        issueDescription: r.issueDescription,
        reportedDate: r.reportedDate,
        status: r.status,
        priority: r.priority,
        photoRef: r.photoRef,
        latitude: r.latitude === null ? null : parseFloat(r.latitude),
        longitude: r.longitude === null ? null : parseFloat(r.longitude),
        createdAt: r.createdAt,
    };
}

export function statusUpdateMessage(status: ReportStatus): string {
    return `Your report status has been updated to ${status}`;
}

/** Choices for the report form. Problem types are suggestions; any label is accepted. */
export function reportOptions() {
    return {
        problemTypes: PROBLEM_TYPES,
        priorities: PRIORITIES,
        statuses: REPORT_STATUSES,
    };
}

// ── Submit ──
export async function submitReport(actor: Actor, input: ReportDraftInput, photo?: Buffer) {
    const draft = parseInput(reportDraftSchema, input);

    const owner = await db.query.users.findFirst({
        where: eq(users.id, actor.userId),
        columns: { id: true, username: true },
    });
    if (!owner) throw ApiError.notFound("User not found");

    const photoRef = photo ? await compressPhoto(photo) : null;

    try {
        const [report] = await db
            .insert(reports)
            .values({
                userId: owner.id,
                reporterName: draft.reporterName ?? owner.username,
                problemType: draft.problemType,
                location: draft.location,
                issueDescription: draft.issueDescription,
                reportedDate: draft.reportedDate,
                status: "Pending",
                priority: draft.priority,
                photoRef,
                latitude: draft.latitude === undefined ? null : String(draft.latitude),
                longitude: draft.longitude === undefined ? null : String(draft.longitude),
            })
            .returning();

        return toReportView(report);
    } catch (error) {
        if (photoRef) await discardPhoto(photoRef);
        throw error;
    }
}

// ── Status transitions ──
// Any status may follow any other, including itself; only membership is checked.
export async function transitionStatus(actor: Actor, reportId: number, newStatus: string) {
    assertAdmin(actor, "Only admins can change report status");

    const status = canonicalStatus(newStatus);

    return db.transaction(async (tx) => {
        const existing = await tx.query.reports.findFirst({
            where: eq(reports.id, reportId),
            columns: { id: true },
        });
        if (!existing) throw ApiError.notFound("Report not found");

        if (!status) {
            throw ApiError.invalidTransition(
                `Invalid status "${newStatus}". Expected one of: ${REPORT_STATUSES.join(", ")}`
            );
        }

        const [updated] = await tx
            .update(reports)
            .set({ status })
            .where(eq(reports.id, reportId))
            .returning();

        await notify(tx, updated.userId, updated.id, statusUpdateMessage(status));
        await record(tx, {
            adminId: actor.userId,
            action: "UPDATE_STATUS",
            targetType: "report",
            targetId: updated.id,
            details: `Status changed to ${status}`,
        });

        return toReportView(updated);
    });
}

// ── Delete ──
// The owner is not notified.
export async function deleteReport(actor: Actor, reportId: number): Promise<void> {
    assertAdmin(actor, "Only admins can delete reports");

    const removed = await db.transaction(async (tx) => {
        const existing = await tx.query.reports.findFirst({
            where: eq(reports.id, reportId),
            columns: { id: true, problemType: true, location: true, photoRef: true },
        });
        if (!existing) throw ApiError.notFound("Report not found");

        await tx.delete(reports).where(eq(reports.id, reportId));
        await record(tx, {
            adminId: actor.userId,
            action: "DELETE",
            targetType: "report",
            targetId: reportId,
            details: `Deleted: ${existing.problemType} - ${existing.location}`,
        });

        return existing;
    });

    if (removed.photoRef) await discardPhoto(removed.photoRef);
}

// ── Reads ──
export async function listReports(actor: Actor, scope: ReportScope): Promise<ReportView[]> {
    if (scope === "all") {
        assertAdmin(actor, "Only admins can list all reports");

        const rows = await db.query.reports.findMany({
            orderBy: [desc(reports.id)],
            with: { user: { columns: { username: true } } },
        });
        return rows.map((r) => ({ ...toReportView(r), username: r.user.username }));
    }

    const rows = await db.query.reports.findMany({
        where: eq(reports.userId, actor.userId),
        orderBy: [desc(reports.id)],
    });
    return rows.map(toReportView);
}

export async function getReport(actor: Actor, reportId: number): Promise<ReportView> {
    const report = await db.query.reports.findFirst({
        where: eq(reports.id, reportId),
        with: { user: { columns: { username: true } } },
    });
    if (!report) throw ApiError.notFound("Report not found");

    if (!isAdmin(actor) && report.userId !== actor.userId) {
        throw ApiError.forbidden("You can only view your own reports");
    }

    return { ...toReportView(report), username: report.user.username };
}
