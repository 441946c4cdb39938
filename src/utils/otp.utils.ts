// file: src/utils/otp.utils.ts

import { createHash, randomInt } from "node:crypto";

export interface IOTPConfig {
  length: number;
  expiryMinutes: number;
}

export interface IOTPResult {
  code: string;
  codeHash: string;
  expiresAt: Date;
  expiresInMinutes: number;
}

export interface IOTPValidationResult {
  isValid: boolean;
  message: string;
  isExpired?: boolean;
}

export class OTPUtil {
  private static readonly DEFAULT_CONFIG: IOTPConfig = {
    length: 4,
    expiryMinutes: 10,
  };

  static generate(
    config?: Partial<IOTPConfig>,
    now: Date = new Date()
  ): IOTPResult {
    const finalConfig = { ...OTPUtil.DEFAULT_CONFIG, ...config };
    OTPUtil.validateConfig(finalConfig);

    const min = Math.pow(10, finalConfig.length - 1);
    const max = Math.pow(10, finalConfig.length);
    const code = randomInt(min, max).toString();

    return {
      code,
      codeHash: OTPUtil.hash(code),
      expiresAt: new Date(now.getTime() + finalConfig.expiryMinutes * 60_000),
      expiresInMinutes: finalConfig.expiryMinutes,
    };
  }

  static hash(code: string): string {
    return createHash("sha256").update(code).digest("hex");
  }

  static validate(
    code: string,
    expectedHash: string | undefined,
    expiresAt: Date | undefined,
    now: Date = new Date()
  ): IOTPValidationResult {
    if (!expectedHash || !expiresAt) {
      return { isValid: false, message: "No verification code was issued" };
    }

    if (!/^\d+$/.test(code)) {
      return { isValid: false, message: "OTP must contain only digits" };
    }

    if (now > expiresAt) {
      return { isValid: false, message: "OTP has expired", isExpired: true };
    }

    if (OTPUtil.hash(code) !== expectedHash) {
      return { isValid: false, message: "Invalid OTP code" };
    }

    return { isValid: true, message: "OTP is valid", isExpired: false };
  }

  private static validateConfig(config: IOTPConfig): void {
    if (config.length < 4 || config.length > 8) {
      throw new Error("OTP length must be between 4 and 8 digits");
    }

    if (config.expiryMinutes < 1 || config.expiryMinutes > 1440) {
      throw new Error("Expiry time must be between 1 and 1440 minutes");
    }
  }
}
