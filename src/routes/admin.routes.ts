import { Router } from "express";
import { authenticate } from "../middleware/auth.js";
import { requireRole } from "../middleware/role.js";
import * as admin from "../controllers/admin.controller.js";

const router = Router();

// Auth + Role check
router.use(authenticate, requireRole("admin"));

// Users
router.get("/users", admin.listUsers);
router.patch("/users/:id/role", admin.changeRole);
router.delete("/users/:id", admin.deleteUser);

// Audit Logs
router.get("/audit-logs", admin.getAuditLogs);
router.delete("/audit-logs", admin.clearAuditLogs);

export default router;
