import { Request, Response, NextFunction } from "express";
import { globalStats, userStats } from "../services/stats.service.js";
import { currentActor } from "../middleware/auth.js";

export async function getGlobalStats(_req: Request, res: Response, next: NextFunction) {
    try {
        res.status(200).json({ success: true, data: await globalStats() });
    } catch (error) {
        next(error);
    }
}

export async function getMyStats(req: Request, res: Response, next: NextFunction) {
    try {
        res.status(200).json({ success: true, data: await userStats(currentActor(req).userId) });
    } catch (error) {
        next(error);
    }
}
