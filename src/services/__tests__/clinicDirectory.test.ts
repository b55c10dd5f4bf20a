import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { ClinicDirectory } from "../clinicDirectory";

describe("ClinicDirectory", () => {
  const tempDirs: string[] = [];

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  function writeDirectory(contents: string): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "clinic-"));
    tempDirs.push(dir);
    const file = path.join(dir, "clinics.json");
    fs.writeFileSync(file, contents);
    return file;
  }

  const directory = new ClinicDirectory({
    locations: [
      { office_location: "Main", address: "1 Test Street" },
      { office_location: "North Clinic", address: "2 Sample Road" },
    ],
    providers: [
      { name: "Dr. Lee", location: "Main" },
      { name: "Dr. Kim", location: "north clinic" },
      { name: "Dr. Roe" },
    ],
  });

  it("finds addresses regardless of case and padding", () => {
    expect(directory.findAddress("  north CLINIC ")).toBe("2 Sample Road");
    expect(directory.findAddress("South")).toBeNull();
    expect(directory.findAddress("")).toBeNull();
  });

  it("lists providers by location", () => {
    expect(directory.findProvidersByLocation("North Clinic").map((p) => p.name)).toEqual([
      "Dr. Kim",
    ]);
    expect(directory.getAllProviders()).toHaveLength(3);
    expect(directory.getAllLocations().map((l) => l.office_location)).toEqual([
      "Main",
      "North Clinic",
    ]);
  });

  it("loads a directory file", () => {
    const file = writeDirectory(
      JSON.stringify({ locations: [{ office_location: "East", address: "3 Demo Avenue" }] })
    );
    const loaded = new ClinicDirectory();
    expect(loaded.loadFromFile(file)).toBe(true);
    expect(loaded.findAddress("east")).toBe("3 Demo Avenue");
    expect(loaded.getAllProviders()).toEqual([]);
  });

  it("stays empty when the file is missing or malformed", () => {
    const loaded = new ClinicDirectory();
    expect(loaded.loadFromFile(path.join(os.tmpdir(), "no-such-clinics.json"))).toBe(false);
    expect(loaded.loadFromFile(writeDirectory("{ not json"))).toBe(false);
    expect(loaded.loadFromFile(writeDirectory(JSON.stringify({ locations: [{ address: "x" }] })))).toBe(false);
    expect(loaded.getAllLocations()).toEqual([]);
  });
});
