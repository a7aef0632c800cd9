import {
    pgTable,
    serial,
    integer,
    varchar,
    text,
    timestamp,
    decimal,
    boolean,
    index,
    uniqueIndex,
} from "drizzle-orm/pg-core";
import { relations } from "drizzle-orm";
import type { Priority, ReportStatus } from "../utils/labels.js";

export const ROLES = ["user", "admin"] as const;
export type Role = (typeof ROLES)[number];

export const AUDIT_ACTIONS = ["UPDATE_STATUS", "DELETE", "UPDATE_ROLE", "LOGOUT"] as const;
export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export const AUDIT_TARGETS = ["report", "user", "system"] as const;
export type AuditTarget = (typeof AUDIT_TARGETS)[number];

// ============================================================
// USERS
// ============================================================
export const users = pgTable(
    "users",
    {
        id: serial("id").primaryKey(),
        username: varchar("username", { length: 100 }).notNull(),
        email: varchar("email", { length: 255 }).notNull(),
        passwordHash: varchar("password_hash", { length: 255 }).notNull(),
        phone: varchar("phone", { length: 20 }),
        role: varchar("role", { length: 20 }).$type<Role>().notNull().default("user"),
        createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    },
    (table) => [
        uniqueIndex("users_username_idx").on(table.username),
        uniqueIndex("users_email_idx").on(table.email),
    ]
);

export const usersRelations = relations(users, ({ many }) => ({
    reports: many(reports),
    notifications: many(notifications),
    auditLogs: many(auditLogs),
}));

// ============================================================
// REPORTS
// ============================================================
export const reports = pgTable(
    "reports",
    {
        id: serial("id").primaryKey(),
        userId: integer("user_id")
            .notNull()
            .references(() => users.id, { onDelete: "cascade" }),
        reporterName: varchar("reporter_name", { length: 255 }).notNull(),
        problemType: varchar("problem_type", { length: 100 }).notNull(),
        location: text("location").notNull(),
        issueDescription: text("issue_description").notNull(),
        reportedDate: varchar("reported_date", { length: 50 }).notNull(),
        status: varchar("status", { length: 20 }).$type<ReportStatus>().notNull().default("Pending"),
        priority: varchar("priority", { length: 20 }).$type<Priority>().notNull().default("Medium"),
        photoRef: varchar("photo_ref", { length: 500 }),
        latitude: decimal("latitude", { precision: 10, scale: 8 }),
        longitude: decimal("longitude", { precision: 11, scale: 8 }),
        createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    },
    (table) => [
        index("reports_user_id_idx").on(table.userId),
        index("reports_status_idx").on(table.status),
    ]
);

export const reportsRelations = relations(reports, ({ one, many }) => ({
    user: one(users, { fields: [reports.userId], references: [users.id] }),
    notifications: many(notifications),
}));

// ============================================================
// NOTIFICATIONS
// ============================================================
export const notifications = pgTable(
    "notifications",
    {
        id: serial("id").primaryKey(),
        userId: integer("user_id")
            .notNull()
            .references(() => users.id, { onDelete: "cascade" }),
        reportId: integer("report_id")
            .notNull()
            .references(() => reports.id, { onDelete: "cascade" }),
        message: text("message").notNull(),
        type: varchar("type", { length: 50 }).notNull().default("status_update"),
        isRead: boolean("is_read").notNull().default(false),
        createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    },
    (table) => [
        index("notifications_user_id_idx").on(table.userId),
        index("notifications_is_read_idx").on(table.isRead),
    ]
);

export const notificationsRelations = relations(notifications, ({ one }) => ({
    user: one(users, { fields: [notifications.userId], references: [users.id] }),
    report: one(reports, { fields: [notifications.reportId], references: [reports.id] }),
}));

// ============================================================
// AUDIT LOGS
// ============================================================
export const auditLogs = pgTable(
    "audit_logs",
    {
        id: serial("id").primaryKey(),
        adminId: integer("admin_id").references(() => users.id, { onDelete: "set null" }),
        action: varchar("action", { length: 100 }).$type<AuditAction>().notNull(),
        targetType: varchar("target_type", { length: 50 }).$type<AuditTarget>().notNull(),
        targetId: integer("target_id"),
        details: text("details"),
        createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    },
    (table) => [
        index("audit_logs_admin_id_idx").on(table.adminId),
        index("audit_logs_action_idx").on(table.action),
    ]
);

export const auditLogsRelations = relations(auditLogs, ({ one }) => ({
    admin: one(users, { fields: [auditLogs.adminId], references: [users.id] }),
}));

export type User = typeof users.$inferSelect;
export type Report = typeof reports.$inferSelect;
export type Notification = typeof notifications.$inferSelect;
export type AuditLog = typeof auditLogs.$inferSelect;
