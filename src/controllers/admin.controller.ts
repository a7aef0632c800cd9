import { Request, Response, NextFunction } from "express";
import * as userService from "../services/user.service.js";
import * as auditService from "../services/audit.service.js";
import { currentActor } from "../middleware/auth.js";
import { userIdSchema, roleChangeSchema } from "../schemas/user.schema.js";
import { auditLogsQuerySchema } from "../schemas/audit.schema.js";

// ── Users ──
export async function listUsers(req: Request, res: Response, next: NextFunction) {
    try { res.json({ success: true, data: await userService.listUsers(currentActor(req)) }); }
    catch (e) { next(e); }
}

export async function changeRole(req: Request, res: Response, next: NextFunction) {
    try {
        const { id } = userIdSchema.parse(req.params);
        const { role } = roleChangeSchema.parse(req.body);
        res.json({ success: true, data: await userService.setRole(currentActor(req), id, role) });
    } catch (e) { next(e); }
}

export async function deleteUser(req: Request, res: Response, next: NextFunction) {
    try {
        const { id } = userIdSchema.parse(req.params);
        await userService.deleteUser(currentActor(req), id);
        res.json({ success: true, data: { id } });
    } catch (e) { next(e); }
}

// ── Audit Log ──
export async function getAuditLogs(req: Request, res: Response, next: NextFunction) {
    try {
        const { limit } = auditLogsQuerySchema.parse(req.query);
        res.json({ success: true, data: await auditService.listAuditLog(currentActor(req), limit) });
    } catch (e) { next(e); }
}

export async function clearAuditLogs(req: Request, res: Response, next: NextFunction) {
    try {
        const removed = await auditService.clearAuditLog(currentActor(req));
        res.json({ success: true, data: { removed } });
    } catch (e) { next(e); }
}
