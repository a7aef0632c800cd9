import { describe, it, expect, beforeEach, vi } from "vitest";
import request from "supertest";
import sharp from "sharp";
import { eq } from "drizzle-orm";
import app from "../src/app.js";
import { db } from "../src/db/index.js";
import { users, type Role } from "../src/db/schema.js";
import { PASSWORD, resetDatabase } from "./helpers/fixtures.js";

vi.mock("../src/db/index.js", async () => (await import("./helpers/pglite.js")).mockDatabaseModule());

interface Session {
    id: number;
    token: string;
}

async function signUp(username: string, role: Role = "user"): Promise<Session> {
    await request(app)
        .post("/api/auth/register")
        .send({ username, email: `${username}@example.com`, password: PASSWORD, confirmPassword: PASSWORD })
        .expect(201);

    if (role === "admin") {
        await db.update(users).set({ role: "admin" }).where(eq(users.username, username));
    }

    const res = await request(app)
        .post("/api/auth/login")
        .send({ email: `${username}@example.com`, password: PASSWORD })
        .expect(200);

    const id: number = res.body.data.user.id;
    const token: string = res.body.data.accessToken;
    return { id, token };
}

const bearer = (session: Session) => `Bearer ${session.token}`;

const pothole = {
    problemType: "Road",
    location: "Main St",
    issueDescription: "pothole",
    reportedDate: "2024-01-01",
    priority: "High",
};

async function fileReport(session: Session, body: Record<string, string> = pothole): Promise<number> {
    const res = await request(app)
        .post("/api/reports")
        .set("Authorization", bearer(session))
        .send(body)
        .expect(201);
    const id: number = res.body.data.id;
    return id;
}

describe("HTTP API", () => {
    beforeEach(async () => {
        await resetDatabase();
    });

    it("answers the health check", async () => {
        const res = await request(app).get("/api/health").expect(200);
        expect(res.body.status).toBe("ok");
    });

    it("serves the report form choices", async () => {
        const alice = await signUp("alice");

        const res = await request(app).get("/api/reports/options").set("Authorization", bearer(alice)).expect(200);

        expect(res.body.data.priorities).toEqual(["Low", "Medium", "High", "Emergency"]);
        expect(res.body.data.statuses).toEqual(["Pending", "In Progress", "Resolved"]);
        expect(res.body.data.problemTypes).toContain("Public Facility");
        expect(res.body.data.problemTypes).toHaveLength(9);
    });

    it("rejects an oversized JSON body with 413", async () => {
        const res = await request(app)
            .post("/api/auth/register")
            .send({ username: "bob", email: "bob@example.com", password: "x".repeat(200_000) })
            .expect(413);

        expect(res.body).toEqual({ success: false, message: "Request body too large", code: "PAYLOAD_TOO_LARGE" });
    });

    it("walks a report from submission to resolution", async () => {
        const alice = await signUp("alice");
        const admin = await signUp("admin", "admin");

        const reportId = await fileReport(alice);

        let stats = await request(app).get("/api/stats").set("Authorization", bearer(alice)).expect(200);
        expect(stats.body.data).toEqual({ total: 1, pending: 1, inProgress: 0, resolved: 0 });

        const updated = await request(app)
            .patch(`/api/reports/${reportId}/status`)
            .set("Authorization", bearer(admin))
            .send({ status: "Resolved" })
            .expect(200);
        expect(updated.body.data.status).toBe("Resolved");

        stats = await request(app).get("/api/stats").set("Authorization", bearer(admin)).expect(200);
        expect(stats.body.data).toEqual({ total: 1, pending: 0, inProgress: 0, resolved: 1 });

        const unread = await request(app)
            .get("/api/notifications/unread-count")
            .set("Authorization", bearer(alice))
            .expect(200);
        expect(unread.body.data).toEqual({ count: 1 });

        const inbox = await request(app).get("/api/notifications").set("Authorization", bearer(alice)).expect(200);
        expect(inbox.body.data).toHaveLength(1);
        expect(inbox.body.data[0].message).toBe("Your report status has been updated to Resolved");

        const after = await request(app)
            .get("/api/notifications/unread-count")
            .set("Authorization", bearer(alice))
            .expect(200);
        expect(after.body.data).toEqual({ count: 0 });

        const mine = await request(app).get("/api/stats/me").set("Authorization", bearer(alice)).expect(200);
        expect(mine.body.data).toEqual({ myReports: 1 });
    });

    it("deleting a user removes their reports and is audited", async () => {
        const alice = await signUp("alice");
        const admin = await signUp("admin", "admin");
        await fileReport(alice);

        await request(app)
            .delete(`/api/admin/users/${alice.id}`)
            .set("Authorization", bearer(admin))
            .expect(200);

        const all = await request(app)
            .get("/api/reports?scope=all")
            .set("Authorization", bearer(admin))
            .expect(200);
        expect(all.body.data).toEqual([]);

        const logs = await request(app).get("/api/admin/audit-logs").set("Authorization", bearer(admin)).expect(200);
        expect(logs.body.data[0]).toMatchObject({
            action: "DELETE",
            targetType: "user",
            targetId: alice.id,
            adminName: "admin",
        });
    });

    it("rejects a duplicate email with 409 and creates no user", async () => {
        const admin = await signUp("admin", "admin");
        await signUp("alice");

        const res = await request(app)
            .post("/api/auth/register")
            .send({ username: "alice2", email: "alice@example.com", password: PASSWORD, confirmPassword: PASSWORD })
            .expect(409);
        expect(res.body).toEqual({ success: false, message: "Email already registered", code: "CONFLICT" });

        const list = await request(app).get("/api/admin/users").set("Authorization", bearer(admin)).expect(200);
        expect(list.body.data).toHaveLength(2);
    });

    it("reports field-level validation failures", async () => {
        const res = await request(app)
            .post("/api/auth/register")
            .send({ username: "bob", email: "bob@example.com", password: "secret1", confirmPassword: "secret2" })
            .expect(400);

        expect(res.body).toEqual({
            success: false,
            message: "Validation failed: confirmPassword: Passwords do not match",
            code: "VALIDATION_ERROR",
        });
    });

    it("rejects bad credentials with 401", async () => {
        await signUp("alice");

        const res = await request(app)
            .post("/api/auth/login")
            .send({ email: "alice@example.com", password: "wrong-password" })
            .expect(401);
        expect(res.body.code).toBe("UNAUTHORIZED");
    });

    it("requires a bearer token", async () => {
        const res = await request(app).get("/api/reports").expect(401);
        expect(res.body.message).toBe("Missing or invalid authorization header");

        await request(app).get("/api/reports").set("Authorization", "Bearer not-a-token").expect(401);
    });

    it("forbids every admin operation to regular users", async () => {
        const alice = await signUp("alice");
        const bob = await signUp("bob");
        const reportId = await fileReport(bob);

        const attempts = [
            request(app).patch(`/api/reports/${reportId}/status`).send({ status: "Resolved" }),
            request(app).delete(`/api/reports/${reportId}`),
            request(app).patch(`/api/admin/users/${bob.id}/role`).send({ role: "admin" }),
            request(app).delete(`/api/admin/users/${bob.id}`),
            request(app).delete("/api/admin/audit-logs"),
            request(app).get("/api/reports?scope=all"),
        ];

        for (const attempt of attempts) {
            const res = await attempt.set("Authorization", bearer(alice));
            expect(res.status).toBe(403);
            expect(res.body.code).toBe("FORBIDDEN");
        }

        const report = await request(app).get(`/api/reports/${reportId}`).set("Authorization", bearer(bob)).expect(200);
        expect(report.body.data.status).toBe("Pending");
    });

    it("rejects a status outside the workflow with 422", async () => {
        const alice = await signUp("alice");
        const admin = await signUp("admin", "admin");
        const reportId = await fileReport(alice);

        const res = await request(app)
            .patch(`/api/reports/${reportId}/status`)
            .set("Authorization", bearer(admin))
            .send({ status: "Archived" })
            .expect(422);
        expect(res.body.code).toBe("INVALID_TRANSITION");
    });

    it("returns 404 for a missing report", async () => {
        const admin = await signUp("admin", "admin");

        const res = await request(app)
            .patch("/api/reports/999/status")
            .set("Authorization", bearer(admin))
            .send({ status: "Resolved" })
            .expect(404);
        expect(res.body.code).toBe("NOT_FOUND");
    });

    it("stops an admin from changing their own role", async () => {
        const admin = await signUp("admin", "admin");

        const res = await request(app)
            .patch(`/api/admin/users/${admin.id}/role`)
            .set("Authorization", bearer(admin))
            .send({ role: "user" })
            .expect(403);
        expect(res.body.code).toBe("SELF_MODIFICATION");
    });

    it("applies a role change to tokens already issued", async () => {
        const alice = await signUp("alice");
        const admin = await signUp("admin", "admin");

        await request(app).get("/api/admin/users").set("Authorization", bearer(alice)).expect(403);

        await request(app)
            .patch(`/api/admin/users/${alice.id}/role`)
            .set("Authorization", bearer(admin))
            .send({ role: "admin" })
            .expect(200);

        await request(app).get("/api/admin/users").set("Authorization", bearer(alice)).expect(200);
    });

    it("accepts multipart submissions with decorated labels and a photo", async () => {
        const alice = await signUp("alice");
        const photo = await sharp({
            create: { width: 1600, height: 1200, channels: 3, background: { r: 10, g: 120, b: 200 } },
        })
            .png()
            .toBuffer();

        const res = await request(app)
            .post("/api/reports")
            .set("Authorization", bearer(alice))
            .field("problemType", "💧 Water - Water supply issues or leaks")
            .field("location", "Elm Park")
            .field("issueDescription", "Burst pipe")
            .field("reportedDate", "2024-02-10")
            .field("priority", "🚨 Emergency - Critical issue needing urgent action")
            .field("latitude", "")
            .attach("photo", photo, "leak.png")
            .expect(201);

        expect(res.body.data).toMatchObject({
            problemType: "Water",
            priority: "Emergency",
            status: "Pending",
            latitude: null,
        });
        expect(res.body.data.photoRef).toMatch(/^\/uploads\/.+\.jpg$/);

        const served = await request(app).get(res.body.data.photoRef).expect(200);
        expect(served.headers["content-type"]).toBe("image/jpeg");
    });

    it("rejects uploads that are not images", async () => {
        const alice = await signUp("alice");

        const res = await request(app)
            .post("/api/reports")
            .set("Authorization", bearer(alice))
            .field("problemType", "Road")
            .field("location", "Main St")
            .field("issueDescription", "pothole")
            .field("reportedDate", "2024-01-01")
            .field("priority", "Low")
            .attach("photo", Buffer.from("plain text"), "notes.txt")
            .expect(400);
        expect(res.body.message).toBe("Only JPEG, PNG, and WebP images are allowed");
    });

    it("lets admins clear the audit log", async () => {
        const alice = await signUp("alice");
        const admin = await signUp("admin", "admin");
        const reportId = await fileReport(alice);
        await request(app)
            .delete(`/api/reports/${reportId}`)
            .set("Authorization", bearer(admin))
            .expect(200);

        const cleared = await request(app).delete("/api/admin/audit-logs").set("Authorization", bearer(admin)).expect(200);
        expect(cleared.body.data).toEqual({ removed: 1 });

        const logs = await request(app).get("/api/admin/audit-logs").set("Authorization", bearer(admin)).expect(200);
        expect(logs.body.data).toEqual([]);
    });

    it("records admin logouts", async () => {
        const admin = await signUp("admin", "admin");

        await request(app).post("/api/auth/logout").set("Authorization", bearer(admin)).expect(200);

        const logs = await request(app)
            .get("/api/admin/audit-logs?limit=1")
            .set("Authorization", bearer(admin))
            .expect(200);
        expect(logs.body.data[0]).toMatchObject({ action: "LOGOUT", targetType: "system" });
    });
});
