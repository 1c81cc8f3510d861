export type SectionName = "dev" | "store" | "alarms" | "shelf" | "elements" | "network";

interface SectionDefinition {
  name: SectionName;
  required: boolean;
}

const SECTION_DEFINITIONS: ReadonlyArray<SectionDefinition> = [
  { name: "dev", required: true },
  { name: "store", required: true },
  { name: "alarms", required: true },
  { name: "shelf", required: false },
  { name: "elements", required: false },
  { name: "network", required: false }
];

export const ALL_SECTIONS: ReadonlyArray<SectionName> = SECTION_DEFINITIONS.map((item) => item.name);

/** Sections fetched for bulk (multi-slot) views. */
export const FOCUSED_SECTIONS: ReadonlyArray<SectionName> = ["dev", "alarms"];

const REQUIRED_SET = new Set(
  SECTION_DEFINITIONS.filter((item) => item.required).map((item) => item.name)
);

export function isRequiredSection(name: SectionName): boolean {
  return REQUIRED_SET.has(name);
}

export function isSectionName(raw: string): raw is SectionName {
  return SECTION_DEFINITIONS.some((item) => item.name === raw);
}
