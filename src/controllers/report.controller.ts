import { Request, Response, NextFunction } from "express";
import * as reportService from "../services/report.service.js";
import { currentActor } from "../middleware/auth.js";
import { reportIdSchema, reportScopeSchema, statusChangeSchema } from "../schemas/report.schema.js";

export async function submit(req: Request, res: Response, next: NextFunction) {
    try {
        // Photo buffer from Multer (if a file was uploaded)
        const report = await reportService.submitReport(currentActor(req), req.body, req.file?.buffer);
        res.status(201).json({ success: true, data: report });
    } catch (error) {
        next(error);
    }
}

export function options(_req: Request, res: Response) {
    res.json({ success: true, data: reportService.reportOptions() });
}

export async function list(req: Request, res: Response, next: NextFunction) {
    try {
        const { scope } = reportScopeSchema.parse(req.query);
        res.json({ success: true, data: await reportService.listReports(currentActor(req), scope) });
    } catch (error) {
        next(error);
    }
}

export async function detail(req: Request, res: Response, next: NextFunction) {
    try {
        const { id } = reportIdSchema.parse(req.params);
        res.json({ success: true, data: await reportService.getReport(currentActor(req), id) });
    } catch (error) {
        next(error);
    }
}

export async function changeStatus(req: Request, res: Response, next: NextFunction) {
    try {
        const { id } = reportIdSchema.parse(req.params);
        const { status } = statusChangeSchema.parse(req.body);
        res.json({ success: true, data: await reportService.transitionStatus(currentActor(req), id, status) });
    } catch (error) {
        next(error);
    }
}

export async function remove(req: Request, res: Response, next: NextFunction) {
    try {
        const { id } = reportIdSchema.parse(req.params);
        await reportService.deleteReport(currentActor(req), id);
        res.json({ success: true, data: { id } });
    } catch (error) {
        next(error);
    }
}
