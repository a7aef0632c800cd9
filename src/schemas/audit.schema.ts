import { z } from "zod";
import { DEFAULT_AUDIT_LIMIT, MAX_AUDIT_LIMIT } from "../services/audit.service.js";

export const auditLogsQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(MAX_AUDIT_LIMIT).default(DEFAULT_AUDIT_LIMIT),
});

export type AuditLogsQuery = z.infer<typeof auditLogsQuerySchema>;
