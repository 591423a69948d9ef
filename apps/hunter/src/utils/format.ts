import type { Port } from "@port-hunter/shared";

/**
 * One-line summary of a port for CLI listings
 */
export function describePort(port: Port): string {
  const addresses = port.addresses.length > 0 ? port.addresses.join(", ") : "(no address)";
  const owner = port.deviceOwner ? ` owner=${port.deviceOwner}` : "";
  return `${port.id}  ${addresses}  [${port.status ?? "UNKNOWN"}]${owner}`;
}
