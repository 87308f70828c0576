import type { SceneDescriptor } from "../core/scene/scene.types";
import type { ChecksumAlgorithm } from "../shared/checksum/checksum";

export type TimeWindow = {
  start: Date;
  end: Date;
};

export type IntegrityToken =
  | { kind: "checksum"; algorithm: ChecksumAlgorithm; value: string }
  | { kind: "size"; bytes: number };

export type DownloadResult = {
  /** File written inside the destination directory. */
  fileName: string;
  integrity: IntegrityToken;
};

export type ToolInvocation = {
  program: string;
  args: string[];
  timeoutMs: number;
  /** The run only counts as successful if this path exists afterwards. */
  expectedArtifact: string;
  cwd?: string;
  env?: Record<string, string>;
};

export type PluginContext = {
  signal?: AbortSignal;
};

/**
 * Capabilities of one data provider. `TOptions` is whatever `parseOptions`
 * makes of the opaque per-sensor configuration; it is passed back unchanged to
 * every other capability.
 */
export interface SensorPlugin<TOptions> {
  readonly type: string;
  /** Throws `ConfigurationError`; `sensor` names the binding in messages. */
  parseOptions(raw: unknown, sensor: string): TOptions;
  query(options: TOptions, window: TimeWindow, ctx: PluginContext): AsyncIterable<SceneDescriptor>;
  download(options: TOptions, descriptor: SceneDescriptor, destinationDir: string, ctx: PluginContext): Promise<DownloadResult>;
  process(options: TOptions, localPath: string, outputDir: string): ToolInvocation;
}

/** A plugin with its options already applied, as the pipeline sees it. */
export type BoundSensor = {
  readonly name: string;
  readonly type: string;
  readonly startDate: Date;
  query(window: TimeWindow, ctx?: PluginContext): AsyncIterable<SceneDescriptor>;
  download(descriptor: SceneDescriptor, destinationDir: string, ctx?: PluginContext): Promise<DownloadResult>;
  process(localPath: string, outputDir: string): ToolInvocation;
};

export const bindSensor = <TOptions>(
  plugin: SensorPlugin<TOptions>,
  binding: { name: string; startDate: Date; options: unknown }
): BoundSensor => {
  const options = plugin.parseOptions(binding.options, binding.name);
  return {
    name: binding.name,
    type: plugin.type,
    startDate: binding.startDate,
    query: (window, ctx = {}) => plugin.query(options, window, ctx),
    download: (descriptor, destinationDir, ctx = {}) => plugin.download(options, descriptor, destinationDir, ctx),
    process: (localPath, outputDir) => plugin.process(options, localPath, outputDir)
  };
};

export type SensorDirectory = {
  get(name: string): BoundSensor | undefined;
  list(): BoundSensor[];
};

export const createSensorDirectory = (sensors: BoundSensor[]): SensorDirectory => {
  const byName = new Map(sensors.map((sensor) => [sensor.name, sensor]));
  return {
    get: (name) => byName.get(name),
    list: () => Array.from(byName.values())
  };
};
