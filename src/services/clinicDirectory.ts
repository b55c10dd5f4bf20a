// ============================================================================
// Clinic Directory
// ============================================================================
// Office locations and providers, loaded from an optional JSON file
// (CLINIC_DIRECTORY_FILE). Without the file the directory is empty and
// scripts use the office location exactly as given in the contact row.

import * as fs from "fs";
import { z } from "zod";
import { config } from "../config";
import { logger } from "../utils/logger";
import { errorMessage } from "../utils/errors";

const clinicLocationSchema = z.object({
  office_location: z.string().min(1),
  address: z.string().min(1),
});

const providerSchema = z
  .object({
    name: z.string().min(1),
    location: z.string().optional(),
    specialty: z.string().optional(),
  })
  .passthrough();

export const clinicDirectorySchema = z.object({
  locations: z.array(clinicLocationSchema).default([]),
  providers: z.array(providerSchema).default([]),
});

export type ClinicLocation = z.infer<typeof clinicLocationSchema>;
export type Provider = z.infer<typeof providerSchema>;
export type ClinicDirectoryData = z.infer<typeof clinicDirectorySchema>;

function key(value: string): string {
  return value.trim().toLowerCase();
}

export class ClinicDirectory {
  private locations: ClinicLocation[] = [];
  private providers: Provider[] = [];

  constructor(data?: ClinicDirectoryData) {
    if (data) {
      this.load(data);
    }
  }

  load(data: ClinicDirectoryData): void {
    this.locations = data.locations;
    this.providers = data.providers;
  }

  /**
   * Load the directory from a JSON file. A missing or malformed file leaves
   * the directory empty.
   */
  loadFromFile(filePath: string): boolean {
    if (!fs.existsSync(filePath)) {
      logger.warn("Clinic directory file not found, running without clinic data", {
        file: filePath,
      });
      return false;
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
      const parsed = clinicDirectorySchema.parse(raw);
      this.load(parsed);
      logger.info("Clinic directory loaded", {
        file: filePath,
        locations: parsed.locations.length,
        providers: parsed.providers.length,
      });
      return true;
    } catch (error) {
      logger.error("Failed to load clinic directory", {
        file: filePath,
        error: errorMessage(error),
      });
      return false;
    }
  }

  /**
   * Full address for a location key (case-insensitive)
   */
  findAddress(location: string): string | null {
    if (!location.trim()) return null;
    const match = this.locations.find((l) => key(l.office_location) === key(location));
    return match ? match.address : null;
  }

  getAllLocations(): ClinicLocation[] {
    return [...this.locations];
  }

  getAllProviders(): Provider[] {
    return [...this.providers];
  }

  findProvidersByLocation(location: string): Provider[] {
    return this.providers.filter(
      (p) => p.location !== undefined && key(p.location) === key(location)
    );
  }
}

export const clinicDirectory = new ClinicDirectory();

if (config.clinic.directoryFile) {
  clinicDirectory.loadFromFile(config.clinic.directoryFile);
}
