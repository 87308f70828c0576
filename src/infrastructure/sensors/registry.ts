import { ConfigurationError } from "../../core/errors";
import { bindSensor, type BoundSensor, type SensorPlugin } from "../../ports/SensorPlugin";
import type { SensorConfigEntry } from "../../shared/config/sensors.config";
import { httpCatalogPlugin } from "./HttpCatalogSensor";
import { localArchivePlugin } from "./LocalArchiveSensor";

type Binding = { name: string; startDate: Date; options: unknown };

/** Binds one configured sensor; hides the plugin's option type from callers. */
export type SensorBinder = (binding: Binding) => BoundSensor;

export const binderFor =
  <TOptions>(plugin: SensorPlugin<TOptions>): SensorBinder =>
  (binding) =>
    bindSensor(plugin, binding);

export const defaultSensorBinders: ReadonlyMap<string, SensorBinder> = new Map([
  [httpCatalogPlugin.type, binderFor(httpCatalogPlugin)],
  [localArchivePlugin.type, binderFor(localArchivePlugin)]
]);

export type DisabledSensor = {
  name: string;
  reason: string;
};

export type ConfiguredSensors = {
  sensors: BoundSensor[];
  disabled: DisabledSensor[];
};

/**
 * Selects the plugin for every enabled entry by its `type` and validates its
 * options. An unknown type or invalid options disables that sensor only.
 */
export const bindConfiguredSensors = (
  entries: readonly SensorConfigEntry[],
  binders: ReadonlyMap<string, SensorBinder> = defaultSensorBinders
): ConfiguredSensors => {
  const sensors: BoundSensor[] = [];
  const disabled: DisabledSensor[] = [];

  for (const entry of entries) {
    if (!entry.enabled) {
      disabled.push({ name: entry.name, reason: "disabled in configuration" });
      continue;
    }

    const binder = binders.get(entry.type);
    if (!binder) {
      disabled.push({ name: entry.name, reason: `unknown sensor type "${entry.type}"` });
      continue;
    }

    try {
      sensors.push(binder({ name: entry.name, startDate: entry.startDate, options: entry.options }));
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      disabled.push({ name: entry.name, reason: err.message });
    }
  }

  for (const sensor of disabled) {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ event: "sensor.disabled", sensor: sensor.name, reason: sensor.reason }));
  }
  return { sensors, disabled };
};
