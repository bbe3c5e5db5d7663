/**
 * Credentials Loader
 *
 * Reads the portal login record once at startup, from the JSON file named
 * by CREDENTIALS_FILE or, when that file does not exist, from EINVOICE_*
 * environment variables. The record is validated with Joi and frozen.
 *
 * File format:
 *   { "ban": "12345678", "user_id": "...", "password": "...", "User": "..." }
 */
import * as fs from "fs";
import * as path from "path";
import Joi from "joi";
import config from "./index";
import { Credentials } from "../shared/types/portal.types";
import { ConfigError } from "../shared/errors/portal.errors";
import { logger, maskId } from "../monitoring/logger";

interface CredentialsRecord {
  ban: string;
  user_id: string;
  password: string;
  User: string;
}

const credentialsSchema = Joi.object<CredentialsRecord>({
  ban: Joi.string()
    .trim()
    .pattern(/^\d{8}$/)
    .required()
    .messages({ "string.pattern.base": "ban must be an 8-digit business number" }),
  user_id: Joi.string().trim().required(),
  password: Joi.string().required(),
  User: Joi.string().trim().required(),
});

function readRecordFile(filePath: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(
      `Cannot read credentials file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function recordFromEnv(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  return {
    ban: env.EINVOICE_BAN,
    user_id: env.EINVOICE_USER_ID,
    password: env.EINVOICE_PASSWORD,
    User: env.EINVOICE_LOCAL_USER,
  };
}

/**
 * Validate a raw credentials record.
 * @throws ConfigError listing every invalid field (never the values)
 */
export function parseCredentials(raw: unknown): Credentials {
  const { error, value } = credentialsSchema.validate(raw, {
    abortEarly: false,
    stripUnknown: true,
  });

  if (error || !value) {
    const details = error
      ? error.details.map((d) => d.message).join("; ")
      : "empty credentials record";
    throw new ConfigError(`Invalid credentials: ${details}`);
  }

  return Object.freeze({
    businessId: value.ban,
    userId: value.user_id,
    password: value.password,
    localUsername: value.User,
  });
}

/**
 * Load credentials from the configured file, falling back to the environment.
 */
export function loadCredentials(
  filePath: string = config.credentialsFile,
  env: NodeJS.ProcessEnv = process.env
): Credentials {
  const resolved = path.resolve(filePath);
  const fromFile = fs.existsSync(resolved);
  const raw = fromFile ? readRecordFile(resolved) : recordFromEnv(env);
  const credentials = parseCredentials(raw);

  logger.info(
    {
      source: fromFile ? resolved : "environment",
      businessId: maskId(credentials.businessId),
    },
    "Credentials loaded"
  );

  return credentials;
}

/**
 * Directory the browser saves exports into: DOWNLOAD_DIR when set,
 * otherwise the local user's Downloads folder for the platform.
 */
export function resolveDownloadDir(
  credentials: Credentials,
  configured: string = config.downloadDir,
  platform: NodeJS.Platform = process.platform
): string {
  if (configured) return path.resolve(configured);

  const user = credentials.localUsername;
  switch (platform) {
    case "win32":
      return path.win32.join("C:\\Users", user, "Downloads");
    case "darwin":
      return path.posix.join("/Users", user, "Downloads");
    default:
      return path.posix.join("/home", user, "Downloads");
  }
}
