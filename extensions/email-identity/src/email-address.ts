export type ParsedAddressEntry =
  | { ok: true; address: string }
  | { ok: false; entry: string; reason: string };

/**
 * Splits on commas that sit outside quoted display names and angle brackets.
 * Group syntax (`Team: a@x.com, b@x.com;`) is unwrapped: the group name is
 * dropped and `;` closes the group. A quote or `<` left open at the end of the
 * header only spoils its own entry; the rest of that tail is split on plain
 * commas.
 */
export function splitAddressList(header: string): string[] {
  const segments: string[] = [];
  let current = "";
  let inQuotes = false;
  let inAngle = false;
  let escaped = false;

  for (const char of header) {
    if (escaped) {
      current += char;
      escaped = false;
      continue;
    }
    if (char === "\\" && inQuotes) {
      current += char;
      escaped = true;
      continue;
    }
    if (char === '"') {
      inQuotes = !inQuotes;
      current += char;
      continue;
    }
    if (!inQuotes && char === "<") {
      inAngle = true;
    } else if (!inQuotes && char === ">") {
      inAngle = false;
    }
    if (!inQuotes && !inAngle) {
      if (char === ",") {
        segments.push(current);
        current = "";
        continue;
      }
      if (char === ":") {
        current = "";
        continue;
      }
      if (char === ";") {
        segments.push(current);
        current = "";
        continue;
      }
    }
    current += char;
  }

  if (inQuotes || inAngle) {
    segments.push(...current.split(","));
  } else {
    segments.push(current);
  }
  return segments.map((segment) => segment.trim()).filter(Boolean);
}

function hasUnbalancedQuotes(text: string): boolean {
  let open = false;
  let escaped = false;
  for (const char of text) {
    if (escaped) {
      escaped = false;
    } else if (char === "\\" && open) {
      escaped = true;
    } else if (char === '"') {
      open = !open;
    }
  }
  return open;
}

function findAddressProblem(address: string): string | null {
  if (!address) {
    return "empty address";
  }
  if (/\s/.test(address)) {
    return "address contains whitespace";
  }
  if (/[<>",:;]/.test(address)) {
    return "address contains a reserved character";
  }
  const parts = address.split("@");
  if (parts.length !== 2) {
    return "address must contain exactly one @";
  }
  const [local, domain] = parts;
  if (!local) {
    return "empty local part";
  }
  if (!domain) {
    return "empty domain part";
  }
  return null;
}

/**
 * Pulls the bare address out of a single list entry, either `user@example.com`
 * or `"Display Name" <user@example.com>`. Case is preserved.
 */
export function parseAddressEntry(entry: string): ParsedAddressEntry {
  const trimmed = entry.trim();
  let candidate = trimmed;

  if (hasUnbalancedQuotes(trimmed)) {
    return { ok: false, entry, reason: "unbalanced quotes" };
  }
  if (trimmed.includes("<") || trimmed.includes(">")) {
    const match = trimmed.match(/<([^<>]*)>$/);
    if (!match) {
      return { ok: false, entry, reason: "unbalanced angle brackets" };
    }
    candidate = match[1].trim();
  }

  const problem = findAddressProblem(candidate);
  if (problem) {
    return { ok: false, entry, reason: problem };
  }
  return { ok: true, address: candidate };
}

export function parseAddressList(header: string): string[] {
  const addresses: string[] = [];
  for (const segment of splitAddressList(header)) {
    const parsed = parseAddressEntry(segment);
    if (parsed.ok) {
      addresses.push(parsed.address);
    }
  }
  return addresses;
}

export function normalizeAddress(address: string | null | undefined): string {
  return (address ?? "").trim().toLowerCase();
}
