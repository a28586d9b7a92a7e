import { BlockList, isIPv4, isIPv6 } from "net";
import { DenyReason } from "../types";

const PRIVATE_V4: [string, number][] = [
  ["0.0.0.0", 8],
  ["10.0.0.0", 8],
  ["100.64.0.0", 10], // carrier-grade NAT
  ["127.0.0.0", 8],
  ["169.254.0.0", 16], // link-local
  ["172.16.0.0", 12],
  ["192.168.0.0", 16],
  ["198.18.0.0", 15], // benchmarking
  ["224.0.0.0", 4], // multicast
  ["240.0.0.0", 4], // reserved, includes broadcast
];

const PRIVATE_V6: [string, number][] = [
  ["::", 128],
  ["::1", 128],
  ["fc00::", 7], // unique local
  ["fe80::", 10], // link-local
  ["ff00::", 8], // multicast
];

const METADATA_V4 = new Set(["169.254.169.254", "169.254.170.2", "100.100.100.200", "168.63.129.16"]);
const METADATA_V6 = new Set(["fd00:ec2:0:0:0:0:0:254"]);

const privateRanges = new BlockList();
for (const [network, prefix] of PRIVATE_V4) privateRanges.addSubnet(network, prefix, "ipv4");
for (const [network, prefix] of PRIVATE_V6) privateRanges.addSubnet(network, prefix, "ipv6");

/**
 * Expands an IPv6 literal to eight lowercase hextets without leading zeros.
 * Handles "::", a trailing dotted quad and a zone id. Null when malformed.
 */
export function expandIPv6(address: string): string[] | null {
  let addr = address.toLowerCase().replace(/^\[|\]$/g, "");
  const zone = addr.indexOf("%");
  if (zone !== -1) addr = addr.slice(0, zone);
  if (!isIPv6(addr)) return null;

  const lastColon = addr.lastIndexOf(":");
  const tail = addr.slice(lastColon + 1);
  if (tail.includes(".")) {
    const octets = tail.split(".").map(Number);
    const high = ((octets[0] << 8) | octets[1]).toString(16);
    const low = ((octets[2] << 8) | octets[3]).toString(16);
    addr = `${addr.slice(0, lastColon + 1)}${high}:${low}`;
  }

  const halves = addr.split("::");
  const head = halves[0] ? halves[0].split(":") : [];
  const rest = halves.length > 1 && halves[1] ? halves[1].split(":") : [];
  const missing = 8 - head.length - rest.length;
  const hextets = halves.length > 1 ? [...head, ...Array<string>(missing).fill("0"), ...rest] : head;
  if (hextets.length !== 8) return null;
  return hextets.map((h) => parseInt(h, 16).toString(16));
}

function hextetsToIPv4(high: string, low: string): string {
  const h = parseInt(high, 16);
  const l = parseInt(low, 16);
  return [h >> 8, h & 0xff, l >> 8, l & 0xff].join(".");
}

/**
 * The IPv4 address carried inside an IPv6 address: IPv4-mapped
 * (::ffff:a.b.c.d), IPv4-compatible (::a.b.c.d), NAT64 (64:ff9b::/96) or
 * 6to4 (2002:aabb:ccdd::/16). "::" and "::1" are not wrapped.
 */
export function unwrapIPv4(address: string): string | null {
  const hextets = expandIPv6(address);
  if (!hextets) return null;

  if (hextets[0] === "2002") return hextetsToIPv4(hextets[1], hextets[2]);
  if (hextets[0] === "64" && hextets[1] === "ff9b" && hextets.slice(2, 6).every((h) => h === "0")) {
    return hextetsToIPv4(hextets[6], hextets[7]);
  }

  const prefixZero = hextets.slice(0, 5).every((h) => h === "0");
  if (!prefixZero) return null;
  const mapped = hextets[5] === "ffff";
  const compatible = hextets[5] === "0" && !(hextets[6] === "0" && (hextets[7] === "0" || hextets[7] === "1"));
  if (!mapped && !compatible) return null;
  return hextetsToIPv4(hextets[6], hextets[7]);
}

/**
 * Why an address may not be fetched, or null when it is public. Anything that
 * does not parse as an IP address is treated as private.
 */
export function classifyAddress(address: string): DenyReason | null {
  const bare = address.replace(/^\[|\]$/g, "");
  if (isIPv4(bare)) {
    if (METADATA_V4.has(bare)) return DenyReason.CLOUD_METADATA;
    return privateRanges.check(bare, "ipv4") ? DenyReason.PRIVATE_IP : null;
  }

  const inner = unwrapIPv4(bare);
  if (inner) return classifyAddress(inner);

  const hextets = expandIPv6(bare);
  if (!hextets) return DenyReason.PRIVATE_IP;
  const canonical = hextets.join(":");
  if (METADATA_V6.has(canonical)) return DenyReason.CLOUD_METADATA;
  return privateRanges.check(canonical, "ipv6") ? DenyReason.PRIVATE_IP : null;
}

export function isIpLiteral(host: string): boolean {
  const bare = host.replace(/^\[|\]$/g, "");
  return isIPv4(bare) || expandIPv6(bare) !== null;
}
