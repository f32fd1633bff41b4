export const SUPPORTED_DEVICES = [
  "fenix7",
  "fenix7s",
  "fenix7x",
  "fr965",
  "fr955",
  "epix2",
  "venu2",
  "vivoactive4",
  "edge1040",
] as const;

export function isKnownDevice(device: string): boolean {
  return SUPPORTED_DEVICES.some((d) => d === device);
}
