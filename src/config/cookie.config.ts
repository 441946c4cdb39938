// file: src/config/cookie.config.ts

import { env } from "@/env";

export const COOKIE_CONFIG = {
  REFRESH_TOKEN: {
    name: "refreshToken",
    options: {
      httpOnly: true,
      secure: env.NODE_ENV === "production",
      sameSite: env.NODE_ENV === "production" ? "none" : "lax",
      path: "/",
      maxAge: 7 * 24 * 60 * 60 * 1000,
    },
  },
} as const;
