import multer from "multer";
import { env } from "../config/env.js";
import { ApiError } from "../utils/apiError.js";

const ALLOWED_TYPES = ["image/jpeg", "image/png", "image/webp"];

// Kept in memory: the photo collaborator re-encodes before anything touches disk
export const photoUpload = multer({
    storage: multer.memoryStorage(),
    limits: {
        fileSize: env.MAX_PHOTO_BYTES,
        files: 1,
    },
    fileFilter: (_req, file, cb) => {
        if (ALLOWED_TYPES.includes(file.mimetype)) {
            cb(null, true);
        } else {
            cb(ApiError.validation("Only JPEG, PNG, and WebP images are allowed"));
        }
    },
});
