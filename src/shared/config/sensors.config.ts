import { readFile } from "fs/promises";
import { ConfigurationError, toErrorMessage } from "../../core/errors";

export type SensorConfigEntry = {
  name: string;
  type: string;
  startDate: Date;
  enabled: boolean;
  /** Plugin-specific; validated by the plugin when the sensor is bound. */
  options: unknown;
};

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null;

const SENSOR_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const parseEntry = (value: unknown, index: number): SensorConfigEntry => {
  const where = `sensors[${index}]`;
  if (!isRecord(value)) throw new ConfigurationError(`${where} must be an object`);

  const name = typeof value.name === "string" ? value.name.trim() : "";
  if (!SENSOR_NAME_PATTERN.test(name)) {
    throw new ConfigurationError(`${where}.name must match ${SENSOR_NAME_PATTERN.source}`);
  }

  const type = typeof value.type === "string" ? value.type.trim() : "";
  if (type === "") throw new ConfigurationError(`${where}.type is required`);

  const startDate = typeof value.startDate === "string" ? new Date(value.startDate) : new Date(Number.NaN);
  if (Number.isNaN(startDate.getTime())) {
    throw new ConfigurationError(`${where}.startDate must be an ISO-8601 date`);
  }

  if (value.enabled != null && typeof value.enabled !== "boolean") {
    throw new ConfigurationError(`${where}.enabled must be a boolean`);
  }

  return { name, type, startDate, enabled: value.enabled !== false, options: value.options ?? {} };
};

/**
 * Validates the shape shared by every sensor. Plugin options are left alone
 * so that one bad sensor can be disabled without rejecting the whole file.
 */
export const parseSensorsConfig = (json: unknown): SensorConfigEntry[] => {
  if (!isRecord(json) || !Array.isArray(json.sensors)) {
    throw new ConfigurationError('Sensors config must be an object with a "sensors" array');
  }

  const entries = json.sensors.map(parseEntry);
  const seen = new Set<string>();
  for (const entry of entries) {
    if (seen.has(entry.name)) throw new ConfigurationError(`Sensor name "${entry.name}" is configured twice`);
    seen.add(entry.name);
  }
  return entries;
};

export const loadSensorsConfig = async (filePath: string): Promise<SensorConfigEntry[]> => {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read sensors config ${filePath}: ${toErrorMessage(err)}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Sensors config ${filePath} is not valid JSON: ${toErrorMessage(err)}`, { cause: err });
  }
  return parseSensorsConfig(json);
};
