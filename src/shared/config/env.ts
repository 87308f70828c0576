import { ConfigurationError } from "../../core/errors";

export type Env = {
  MONGO_URI: string;
  MONGO_DB: string;
  STORAGE_ROOT: string;
  SENSORS_CONFIG: string;
};

// Seed lists (`host1:27017,host2:27017`) are not valid WHATWG URLs, so only the scheme is checked here.
const MONGO_URI_PATTERN = /^mongodb(\+srv)?:\/\/[^\s/]+/;

const validateMongoUri = (name: string, value: string): string => {
  if (!MONGO_URI_PATTERN.test(value)) {
    throw new ConfigurationError(`${name} must be a mongodb:// or mongodb+srv:// URI`);
  }
  return value;
};

const nonEmpty = (value: string | undefined, fallback: string): string => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = validateMongoUri("MONGO_URI", nonEmpty(env.MONGO_URI, "mongodb://localhost:27017/eodd"));
  const MONGO_DB = nonEmpty(env.MONGO_DB, "eodd");
  const STORAGE_ROOT = nonEmpty(env.STORAGE_ROOT, "./data");
  const SENSORS_CONFIG = nonEmpty(env.SENSORS_CONFIG, "./sensors.json");

  return { MONGO_URI, MONGO_DB, STORAGE_ROOT, SENSORS_CONFIG };
};
