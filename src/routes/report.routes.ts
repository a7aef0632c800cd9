import { Router } from "express";
import * as reports from "../controllers/report.controller.js";
import { authenticate } from "../middleware/auth.js";
import { requireRole } from "../middleware/role.js";
import { photoUpload } from "../middleware/upload.js";

const router = Router();

router.use(authenticate, requireRole("user", "admin"));

// Multer only consumes multipart/form-data; JSON bodies pass straight through
router.post("/", photoUpload.single("photo"), reports.submit);
router.get("/", reports.list);
router.get("/options", reports.options);
router.get("/:id", reports.detail);

router.patch("/:id/status", requireRole("admin"), reports.changeStatus);
router.delete("/:id", requireRole("admin"), reports.remove);

export default router;
