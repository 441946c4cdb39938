// file: src/seeders/admin.seeder.ts

import { ACCOUNT_STATUS, ROLES } from "@/constants/app.constants";
import { env } from "@/env";
import { logger } from "@/middlewares/pino-logger";
import { User } from "@/modules/user/user.model";
import { hashPassword } from "@/utils/password.utils";

/**
 * Creates the default admin from `ADMIN_EMAIL` / `ADMIN_PASSWORD`
 * unless an admin with that email exists.
 */
export class AdminSeeder {
  static async run(): Promise<void> {
    const email = env.ADMIN_EMAIL.toLowerCase();

    try {
      const existingAdmin = await User.findOne({ email, role: ROLES.ADMIN });

      if (existingAdmin) {
        logger.info("Admin user already exists. Skipping seeder.");
        return;
      }

      await User.create({
        email,
        password: await hashPassword(env.ADMIN_PASSWORD),
        fullName: "Administrator",
        role: ROLES.ADMIN,
        emailVerified: true,
        accountStatus: ACCOUNT_STATUS.ACTIVE,
      });

      logger.info({ email, role: ROLES.ADMIN }, "Admin user created");
      logger.warn({ email }, "Change the admin password after first login.");
    } catch (error) {
      logger.error(error, "Error running admin seeder");
      throw error;
    }
  }
}
