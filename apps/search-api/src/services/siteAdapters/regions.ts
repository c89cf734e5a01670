import type { RegionInfo } from "@dealfinder/shared";

export const REGIONS: readonly RegionInfo[] = [
  { code: "global", name: "Global" },
  { code: "us", name: "United States" },
  { code: "eu", name: "European Union" },
  { code: "uk", name: "United Kingdom" },
  { code: "de", name: "Germany" },
  { code: "fr", name: "France" },
  { code: "cn", name: "China" },
  { code: "jp", name: "Japan" },
  { code: "au", name: "Australia" },
  { code: "ar", name: "Argentina" },
  { code: "in", name: "India" },
  { code: "kr", name: "South Korea" },
  { code: "br", name: "Brazil" },
  { code: "ru", name: "Russia" },
  { code: "gr", name: "Greece" },
];

export const GLOBAL_REGION = "global";

const REGION_CODES = new Set(REGIONS.map((r) => r.code));

export function isKnownRegion(code: string): boolean {
  return REGION_CODES.has(code);
}
