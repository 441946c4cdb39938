// file: src/utils/password.utils.ts

import { env } from "@/env";
import bcryptjs from "bcryptjs";
import { randomInt } from "node:crypto";

export class PasswordUtil {
  static async hashPassword(password: string): Promise<string> {
    const saltRounds = env.SALT_ROUNDS || 10;
    return bcryptjs.hash(password, saltRounds);
  }

  static async comparePassword(
    password: string,
    hash: string
  ): Promise<boolean> {
    return bcryptjs.compare(password, hash);
  }

  static generateRandomPassword(length: number = 12): string {
    const uppercase = "ABCDEFGHJKLMNPQRSTUVWXYZ";
    const lowercase = "abcdefghijkmnopqrstuvwxyz";
    const numbers = "23456789";
    const specials = "!@#$%^&*";
    const pick = (chars: string) => chars[randomInt(chars.length)];

    const characters = [
      pick(uppercase),
      pick(lowercase),
      pick(numbers),
      pick(specials),
    ];

    const allChars = uppercase + lowercase + numbers + specials;
    while (characters.length < length) {
      characters.push(pick(allChars));
    }

    // Fisher-Yates
    for (let i = characters.length - 1; i > 0; i--) {
      const j = randomInt(i + 1);
      [characters[i], characters[j]] = [characters[j], characters[i]];
    }

    return characters.join("");
  }
}

export const hashPassword = PasswordUtil.hashPassword;
export const comparePassword = PasswordUtil.comparePassword;
export const generateRandomPassword = PasswordUtil.generateRandomPassword;
