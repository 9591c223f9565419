/**
 * Whitespace field of the first IP on an `ignite ps` line.
 *
 * `ignite ps` prints: VM ID, IMAGE, KERNEL, SIZE, CPUS, MEMORY, CREATED, STATUS, IPS,
 * PORTS, NAME. SIZE and MEMORY are "<value> <unit>", CREATED is "<n> ago" and STATUS is
 * "Up <n>", each two fields, which puts IPS at index 12. A change to that layout
 * breaks IP discovery.
 */
export const IGNITE_PS_IP_FIELD = 12;

/**
 * Returns the IP on the first line that mentions nodeName and has enough fields.
 * The match is a substring match, so "m1" also matches a VM named "m10".
 */
export function findNodeIpInListing(nodeName: string, listing: string): string | undefined {
  for (const line of listing.split(/\r?\n/)) {
    if (!line.includes(nodeName)) continue;
    const fields = line.trim().split(/\s+/);
    if (fields.length > IGNITE_PS_IP_FIELD) {
      return fields[IGNITE_PS_IP_FIELD];
    }
  }
  return undefined;
}
