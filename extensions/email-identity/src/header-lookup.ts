import type { HeaderLookup } from "./types.js";

export type RawHeader = {
  name: string;
  value: string;
};

export type HeaderSource = RawHeader[] | Record<string, string | string[] | undefined>;

function headerKey(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Indexes headers by case-insensitive name. Accepts the `{ name, value }` list
 * that mail APIs return in `payload.headers`, or a plain record where repeated
 * headers are given as arrays.
 */
export function createHeaderLookup(headers: HeaderSource): HeaderLookup {
  const index = new Map<string, string[]>();

  const add = (name: string, value: string) => {
    const key = headerKey(name);
    const values = index.get(key);
    if (values) {
      values.push(value);
    } else {
      index.set(key, [value]);
    }
  };

  if (Array.isArray(headers)) {
    for (const h of headers) {
      add(h.name, h.value);
    }
  } else {
    for (const [name, value] of Object.entries(headers)) {
      if (value === undefined) {
        continue;
      }
      if (typeof value === "string") {
        add(name, value);
        continue;
      }
      for (const entry of value) {
        add(name, entry);
      }
    }
  }

  return {
    getHeaderValues: (name) => [...(index.get(headerKey(name)) ?? [])],
  };
}
