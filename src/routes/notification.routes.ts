import { Router } from "express";
import * as notifications from "../controllers/notification.controller.js";
import { authenticate } from "../middleware/auth.js";

const router = Router();

router.use(authenticate);

router.get("/", notifications.list);
router.get("/unread-count", notifications.unreadCount);
router.post("/read-all", notifications.markAllRead);

export default router;
