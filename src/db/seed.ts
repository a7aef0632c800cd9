import bcrypt from "bcryptjs";
import { eq } from "drizzle-orm";
import { env } from "../config/env.js";
import { db, closeDatabase } from "./index.js";
import { users } from "./schema.js";

async function seed() {
    console.log("🌱 Seeding database...\n");

    if (!env.ADMIN_PASSWORD) {
        throw new Error("ADMIN_PASSWORD must be set to seed the admin account");
    }

    const adminEmail = env.ADMIN_EMAIL.toLowerCase();
    const existing = await db.query.users.findFirst({
        where: eq(users.email, adminEmail),
    });

    if (!existing) {
        const passwordHash = await bcrypt.hash(env.ADMIN_PASSWORD, env.BCRYPT_ROUNDS);
        await db.insert(users).values({
            username: env.ADMIN_USERNAME,
            email: adminEmail,
            passwordHash,
            role: "admin",
        });
        console.log(`✅ Admin created: ${adminEmail}`);
    } else {
        console.log("⏭️  Admin already exists");
    }

    console.log("\n🎉 Seed complete!");
    await closeDatabase();
}

seed().catch((err) => {
    console.error("❌ Seed failed:", err);
    process.exit(1);
});
