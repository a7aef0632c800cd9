import { Router } from "express";
import { getGlobalStats, getMyStats } from "../controllers/stats.controller.js";
import { authenticate } from "../middleware/auth.js";

const router = Router();

router.use(authenticate);

router.get("/", getGlobalStats);
router.get("/me", getMyStats);

export default router;
