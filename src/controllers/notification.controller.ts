import { Request, Response, NextFunction } from "express";
import * as notificationService from "../services/notification.service.js";
import { currentActor } from "../middleware/auth.js";

export async function list(req: Request, res: Response, next: NextFunction) {
    try {
        const data = await notificationService.viewNotifications(currentActor(req).userId);
        res.json({ success: true, data });
    } catch (e) { next(e); }
}

export async function unreadCount(req: Request, res: Response, next: NextFunction) {
    try {
        const count = await notificationService.unreadCount(currentActor(req).userId);
        res.json({ success: true, data: { count } });
    } catch (e) { next(e); }
}

export async function markAllRead(req: Request, res: Response, next: NextFunction) {
    try {
        const updated = await notificationService.markAllRead(currentActor(req).userId);
        res.json({ success: true, data: { updated } });
    } catch (e) { next(e); }
}
