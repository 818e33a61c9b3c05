import { isIP, isIPv4 } from "node:net";
import type { Prompter } from "./prompts";

export type ParsedAddress =
  | { kind: "cidr"; value: string }
  | { kind: "ip"; value: string };

export interface AddressAnswer {
  ip: string;
  mask?: string;
}

/**
 * Prefix length of a dotted IPv4 netmask, or null when the ones are not contiguous.
 */
export function netmaskToPrefix(mask: string): number | null {
  if (!isIPv4(mask)) {
    return null;
  }
  const bits = mask
    .split(".")
    .map((octet) => Number(octet).toString(2).padStart(8, "0"))
    .join("");
  if (!/^1*0*$/.test(bits)) {
    return null;
  }
  const firstZero = bits.indexOf("0");
  return firstZero === -1 ? 32 : firstZero;
}

function parsePrefix(value: string, maxBits: number): number | null {
  if (!/^\d{1,3}$/.test(value)) {
    return null;
  }
  const prefix = Number(value);
  return prefix <= maxBits ? prefix : null;
}

export function isValidMask(mask: string): boolean {
  const value = mask.trim();
  if (/^\d+$/.test(value)) {
    return parsePrefix(value, 32) !== null;
  }
  return netmaskToPrefix(value) !== null;
}

/**
 * Accepts `10.0.0.1`, `10.0.0.1/24`, `10.0.0.1/255.255.255.0` or an IPv6
 * equivalent. CIDR answers come back in prefix-length form.
 */
export function parseIpOrCidr(input: string): ParsedAddress {
  const value = input.trim();
  if (value.includes("/")) {
    const parts = value.split("/");
    const [address = "", suffix = ""] = parts;
    const family = isIP(address);
    if (parts.length !== 2 || family === 0) {
      throw new Error("Invalid CIDR (e.g., 10.0.0.1/24).");
    }
    const prefix =
      family === 4
        ? (parsePrefix(suffix, 32) ?? netmaskToPrefix(suffix))
        : parsePrefix(suffix, 128);
    if (prefix === null) {
      throw new Error("Invalid CIDR (e.g., 10.0.0.1/24).");
    }
    return { kind: "cidr", value: `${address}/${prefix}` };
  }

  if (isIP(value) === 0) {
    throw new Error("Invalid IP address.");
  }
  return { kind: "ip", value };
}

export async function promptAddress(
  prompter: Prompter,
  defaultIp: string,
  defaultMask?: string,
): Promise<AddressAnswer> {
  while (true) {
    const answer = await prompter.text("IP (CIDR or dotted)", defaultIp);
    let parsed: ParsedAddress;
    try {
      parsed = parseIpOrCidr(answer);
    } catch (error) {
      prompter.print(`⚠️  ${error instanceof Error ? error.message : String(error)}`);
      continue;
    }
    if (parsed.kind === "cidr") {
      return { ip: parsed.value };
    }

    while (true) {
      const mask = await prompter.text(
        "Mask (CIDR length like 24 or dotted like 255.255.255.0)",
        defaultMask ?? "24",
      );
      if (isValidMask(mask)) {
        return { ip: parsed.value, mask };
      }
      prompter.print("⚠️  Invalid mask.");
    }
  }
}
