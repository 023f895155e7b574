import { getSupabaseClient } from "../db/supabaseClient";
import type { DateRange } from "../lib/dates";
import type { PersistedVolume, VolumeMap } from "./types";

/** Durable home for exact volume maps so they survive restarts. */
export type VolumeBlobStore = {
  load(range: DateRange): Promise<PersistedVolume | null>;
  save(range: DateRange, volumes: VolumeMap, generatedAt: Date): Promise<void>;
};

export const volumeBlobPath = (range: DateRange): string => `volume/${range.start}_${range.end}.json`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parsePersistedVolume(value: unknown): PersistedVolume | null {
  if (!isRecord(value)) return null;
  const { from, to, generatedAt, volumes } = value;
  if (typeof from !== "string" || typeof to !== "string" || typeof generatedAt !== "string") return null;
  if (Number.isNaN(Date.parse(generatedAt)) || !isRecord(volumes)) return null;
  const parsed: VolumeMap = {};
  for (const [key, sent] of Object.entries(volumes)) {
    if (typeof sent === "number" && Number.isFinite(sent)) parsed[key] = sent;
  }
  return { from, to, generatedAt, volumes: parsed };
}

const isNotFound = (message: string): boolean => /not found|does not exist/i.test(message);

export function createSupabaseVolumeBlobStore(bucket: string): VolumeBlobStore {
  return {
    async load(range) {
      const client = getSupabaseClient();
      const path = volumeBlobPath(range);
      const { data, error } = await client.storage.from(bucket).download(path);
      if (error) {
        if (isNotFound(error.message)) return null;
        throw new Error(`Failed downloading ${bucket}/${path}: ${error.message}`);
      }
      if (!data) return null;
      const text = await data.text();
      const parsed = parsePersistedVolume(JSON.parse(text));
      if (!parsed) {
        console.warn(`Volume: ignoring malformed blob ${bucket}/${path}`);
      }
      return parsed;
    },

    async save(range, volumes, generatedAt) {
      const client = getSupabaseClient();
      const path = volumeBlobPath(range);
      const body: PersistedVolume = {
        from: range.start,
        to: range.end,
        generatedAt: generatedAt.toISOString(),
        volumes,
      };
      const { error } = await client.storage.from(bucket).upload(path, JSON.stringify(body), {
        upsert: true,
        contentType: "application/json",
      });
      if (error) throw new Error(`Failed uploading ${bucket}/${path}: ${error.message}`);
    },
  };
}
