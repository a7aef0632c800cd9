import { Request, Response, NextFunction } from "express";
import { registerUser, loginUser, logoutUser, getUser } from "../services/user.service.js";
import { currentActor } from "../middleware/auth.js";

export async function register(req: Request, res: Response, next: NextFunction) {
    try {
        const user = await registerUser(req.body);
        res.status(201).json({ success: true, data: user });
    } catch (error) {
        next(error);
    }
}

export async function login(req: Request, res: Response, next: NextFunction) {
    try {
        const result = await loginUser(req.body);
        res.status(200).json({ success: true, data: result });
    } catch (error) {
        next(error);
    }
}

export async function logout(req: Request, res: Response, next: NextFunction) {
    try {
        await logoutUser(currentActor(req));
        res.status(200).json({ success: true, data: { loggedOut: true } });
    } catch (error) {
        next(error);
    }
}

export async function me(req: Request, res: Response, next: NextFunction) {
    try {
        const user = await getUser(currentActor(req).userId);
        res.status(200).json({ success: true, data: user });
    } catch (error) {
        next(error);
    }
}
