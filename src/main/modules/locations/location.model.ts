/**
 * Location model
 * Defines the schema and canonical serialization for a Location record
 */
import { z } from 'zod';
import type { Location } from '../../../@types/location';

export const locationSchema = z.object({
  id: z.number().int().safe(),
  name: z.string(),
  category: z.string(),
  city: z.string(),
  state: z.string(),
  park: z.string(),
  description: z.string(),
  imageName: z.string(),
  isCompleted: z.boolean(),
}).strict();

export const locationListSchema = z.array(locationSchema).superRefine((locations, ctx) => {
  const seen = new Set<number>();
  locations.forEach((location, index) => {
    if (seen.has(location.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate location id ${location.id}`,
        path: [index, 'id'],
      });
    }
    seen.add(location.id);
  });
});

export type DecodeResult =
  | { ok: true; locations: Location[] }
  | { ok: false; reason: string };

/**
 * Location model with methods for validation and conversion
 */
export class LocationModel {
  /**
   * Copy a Location with its fields in canonical order.
   * Serialized files always list fields in this order.
   */
  public static normalize(location: Location): Location {
    return {
      id: location.id,
      name: location.name,
      category: location.category,
      city: location.city,
      state: location.state,
      park: location.park,
      description: location.description,
      imageName: location.imageName,
      isCompleted: location.isCompleted,
    };
  }

  /**
   * The same location with its completion flag flipped
   */
  public static toggled(location: Location): Location {
    return { ...LocationModel.normalize(location), isCompleted: !location.isCompleted };
  }

  public static validate(value: unknown): value is Location {
    return locationSchema.safeParse(value).success;
  }

  /**
   * Decode file contents into a list of locations.
   * Fails on invalid JSON, on any record not matching the schema and on duplicate ids.
   */
  public static decodeList(content: string): DecodeResult {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, reason: `Invalid JSON: ${message}` };
    }

    const parsed = locationListSchema.safeParse(raw);
    if (!parsed.success) {
      return { ok: false, reason: LocationModel.describeIssues(parsed.error) };
    }

    return { ok: true, locations: parsed.data.map(location => LocationModel.normalize(location)) };
  }

  /**
   * Encode a list of locations as the on-disk JSON document
   */
  public static encodeList(locations: readonly Location[]): string {
    return JSON.stringify(locations.map(location => LocationModel.normalize(location)), null, 2);
  }

  private static describeIssues(error: z.ZodError): string {
    return error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
  }
}
