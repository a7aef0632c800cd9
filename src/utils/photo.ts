import sharp from "sharp";
import crypto from "crypto";
import fs from "fs/promises";
import path from "path";
import { env } from "../config/env.js";
import { ApiError } from "./apiError.js";

export const PHOTO_MAX_WIDTH = 800;
export const PHOTO_MAX_HEIGHT = 600;
const PHOTO_QUALITY = 85;

const PUBLIC_PREFIX = "/uploads/";

export function uploadDir(): string {
    return path.resolve(env.UPLOAD_DIR);
}

/**
 * Shrinks a photo to fit 800x600, re-encodes it as JPEG and stores it under
 * the upload directory. Returns the public reference that gets persisted.
 */
export async function compressPhoto(buffer: Buffer): Promise<string> {
    if (buffer.length === 0) {
        throw ApiError.validation("Photo is empty");
    }

    let output: Buffer;
    try {
        output = await sharp(buffer)
            .rotate() // Auto-rotate based on EXIF
            .resize({
                width: PHOTO_MAX_WIDTH,
                height: PHOTO_MAX_HEIGHT,
                fit: "inside",
                withoutEnlargement: true,
            })
            .flatten({ background: "#ffffff" })
            .jpeg({ quality: PHOTO_QUALITY, mozjpeg: true })
            .toBuffer();
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw ApiError.validation(`Photo could not be processed: ${reason}`);
    }

    const filename = `${crypto.randomUUID()}.jpg`;
    await fs.mkdir(uploadDir(), { recursive: true });
    await fs.writeFile(path.join(uploadDir(), filename), output);

    return `${PUBLIC_PREFIX}${filename}`;
}

export function photoPath(ref: string): string | undefined {
    if (!ref.startsWith(PUBLIC_PREFIX)) return undefined;
    const filename = path.basename(ref);
    return path.join(uploadDir(), filename);
}

export async function discardPhoto(ref: string): Promise<void> {
    const file = photoPath(ref);
    if (!file) return;
    try {
        await fs.unlink(file);
    } catch (error) {
        console.error(`⚠️ Failed to remove photo ${ref}:`, error);
    }
}
