export type ParkKey = "magic_kingdom" | "epcot" | "hollywood_studios" | "animal_kingdom";

export interface ParkDefinition {
  key: ParkKey;
  /** queue-times.com park id */
  queueTimesId: number;
  name: string;
  slug: string;
  opensAt: string;
}

export const DEFAULT_OPENS_AT = "9:00 AM";

export const PARKS: readonly ParkDefinition[] = [
  { key: "magic_kingdom", queueTimesId: 6, name: "Magic Kingdom", slug: "magic-kingdom", opensAt: DEFAULT_OPENS_AT },
  { key: "epcot", queueTimesId: 5, name: "EPCOT", slug: "epcot", opensAt: DEFAULT_OPENS_AT },
  {
    key: "hollywood_studios",
    queueTimesId: 7,
    name: "Hollywood Studios",
    slug: "hollywood-studios",
    opensAt: DEFAULT_OPENS_AT,
  },
  { key: "animal_kingdom", queueTimesId: 8, name: "Animal Kingdom", slug: "animal-kingdom", opensAt: DEFAULT_OPENS_AT },
];

export const isParkKey = (value: string): value is ParkKey => PARKS.some((park) => park.key === value);

export const findParkByKey = (key: string): ParkDefinition | undefined => PARKS.find((park) => park.key === key);

export const findParkBySlug = (slug: string): ParkDefinition | undefined => PARKS.find((park) => park.slug === slug);
