export type VolumeMode = "exact" | "segment" | "list" | "estimated";

/** Send volume keyed by uppercased data-set code. */
export type VolumeMap = Record<string, number>;

export type VolumeResult = {
  mode: VolumeMode;
  volumes: VolumeMap;
};

export type PersistedVolume = {
  from: string;
  to: string;
  generatedAt: string;
  volumes: VolumeMap;
};
