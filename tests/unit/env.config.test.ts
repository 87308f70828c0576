import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { ConfigurationError } from "../../src/core/errors";
import { loadEnv } from "../../src/shared/config/env";
import { loadSensorsConfig, parseSensorsConfig } from "../../src/shared/config/sensors.config";

describe("loadEnv", () => {
  it("applies defaults", () => {
    expect(loadEnv({})).toEqual({
      MONGO_URI: "mongodb://localhost:27017/eodd",
      MONGO_DB: "eodd",
      STORAGE_ROOT: "./data",
      SENSORS_CONFIG: "./sensors.json"
    });
  });

  it("accepts replica-set seed lists and srv URIs", () => {
    expect(loadEnv({ MONGO_URI: "mongodb://db1:27017,db2:27017/eodd?replicaSet=rs0" }).MONGO_URI).toBe(
      "mongodb://db1:27017,db2:27017/eodd?replicaSet=rs0"
    );
    expect(loadEnv({ MONGO_URI: "mongodb+srv://cluster.example.net" }).MONGO_URI).toBe("mongodb+srv://cluster.example.net");
  });

  it("rejects non-mongodb URIs", () => {
    expect(() => loadEnv({ MONGO_URI: "postgres://localhost/eodd" })).toThrow(
      "MONGO_URI must be a mongodb:// or mongodb+srv:// URI"
    );
  });
});

describe("sensors config", () => {
  const valid = {
    name: "optical",
    type: "http-catalog",
    startDate: "2024-01-01T00:00:00Z",
    options: { baseUrl: "http://localhost" }
  };

  it("parses entries and defaults enabled to true", () => {
    expect(parseSensorsConfig({ sensors: [valid] })).toEqual([
      {
        name: "optical",
        type: "http-catalog",
        startDate: new Date("2024-01-01T00:00:00Z"),
        enabled: true,
        options: { baseUrl: "http://localhost" }
      }
    ]);
  });

  it("rejects malformed entries", () => {
    expect(() => parseSensorsConfig({})).toThrow('Sensors config must be an object with a "sensors" array');
    expect(() => parseSensorsConfig({ sensors: [{ ...valid, name: "bad name" }] })).toThrow("sensors[0].name must match");
    expect(() => parseSensorsConfig({ sensors: [{ ...valid, startDate: "soon" }] })).toThrow(
      "sensors[0].startDate must be an ISO-8601 date"
    );
    expect(() => parseSensorsConfig({ sensors: [{ ...valid, enabled: "yes" }] })).toThrow("sensors[0].enabled must be a boolean");
  });

  it("rejects duplicate sensor names", () => {
    expect(() => parseSensorsConfig({ sensors: [valid, valid] })).toThrow('Sensor name "optical" is configured twice');
  });

  describe("from disk", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), "eodd-config-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("loads a sensors file", async () => {
      const file = path.join(dir, "sensors.json");
      await writeFile(file, JSON.stringify({ sensors: [valid] }));
      await expect(loadSensorsConfig(file)).resolves.toHaveLength(1);
    });

    it("reports unreadable and invalid files as configuration errors", async () => {
      await expect(loadSensorsConfig(path.join(dir, "missing.json"))).rejects.toThrow(ConfigurationError);

      const file = path.join(dir, "broken.json");
      await writeFile(file, "{ not json");
      await expect(loadSensorsConfig(file)).rejects.toThrow(`Sensors config ${file} is not valid JSON`);
    });
  });
});
