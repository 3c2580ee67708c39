/**
 * Auth demo config loader.
 *
 * Reads AUTH_* variables (plus JWT_SECRET, TOKEN_EXPIRE_MINUTES, BCRYPT_ROUNDS,
 * LOGIN_MAX_ATTEMPTS) from the environment. Bad values fall back to defaults
 * with a warning instead of failing startup.
 */

import dotenv from "dotenv";
import { readInt } from "../env.js";

dotenv.config();

/** Used when JWT_SECRET is unset. Startup warns about it. */
export const PLACEHOLDER_JWT_SECRET = "change-me-in-production";

export interface AuthDemoConfig {
  host: string;
  port: number;
  jwtSecret: string;
  tokenExpireMinutes: number;
  /** bcrypt cost factor (4..15) */
  bcryptRounds: number;
  /** Failed logins allowed per IP per 15 minutes */
  loginMaxAttempts: number;
  requestLogging: boolean;
}

export const DEFAULT_AUTH_DEMO_CONFIG: AuthDemoConfig = {
  host: "0.0.0.0",
  port: 8001,
  jwtSecret: PLACEHOLDER_JWT_SECRET,
  tokenExpireMinutes: 30,
  bcryptRounds: 10,
  loginMaxAttempts: 5,
  requestLogging: true,
};

export function loadAuthDemoConfig(env: NodeJS.ProcessEnv = process.env): {
  config: AuthDemoConfig;
  warnings: string[];
} {
  const warnings: string[] = [];
  const d = DEFAULT_AUTH_DEMO_CONFIG;

  const jwtSecret = env.JWT_SECRET || d.jwtSecret;
  if (jwtSecret === PLACEHOLDER_JWT_SECRET) {
    warnings.push("JWT_SECRET is not set — tokens are signed with a placeholder secret.");
  }

  const config: AuthDemoConfig = {
    host: env.AUTH_HOST || d.host,
    port: readInt(env.AUTH_PORT, "AUTH_PORT", d.port, 1, 65535, warnings),
    jwtSecret,
    tokenExpireMinutes: readInt(env.TOKEN_EXPIRE_MINUTES, "TOKEN_EXPIRE_MINUTES", d.tokenExpireMinutes, 1, 7 * 24 * 60, warnings),
    bcryptRounds: readInt(env.BCRYPT_ROUNDS, "BCRYPT_ROUNDS", d.bcryptRounds, 4, 15, warnings),
    loginMaxAttempts: readInt(env.LOGIN_MAX_ATTEMPTS, "LOGIN_MAX_ATTEMPTS", d.loginMaxAttempts, 1, 1000, warnings),
    requestLogging: env.REQUEST_LOGGING !== "false",
  };

  return { config, warnings };
}
