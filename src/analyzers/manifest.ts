const IMPLEMENTATION_VENDOR = "implementation-vendor";
const BUNDLE_VENDOR = "bundle-vendor";

/**
 * Main-section attributes of a JAR manifest, keyed by lower-cased name.
 * Continuation lines start with a single space; the main section ends at the first blank line.
 */
export function parseManifestMainAttributes(text: string): Map<string, string> {
  const attributes = new Map<string, string>();
  let currentName: string | null = null;

  for (const line of text.split(/\r\n|\r|\n/)) {
    if (line.length === 0) break;
    if (line.startsWith(" ")) {
      if (currentName === null) continue;
      attributes.set(currentName, (attributes.get(currentName) ?? "") + line.slice(1));
      continue;
    }
    const sep = line.indexOf(":");
    if (sep <= 0) {
      currentName = null;
      continue;
    }
    currentName = line.slice(0, sep).trim().toLowerCase();
    const rest = line.slice(sep + 1);
    attributes.set(currentName, rest.startsWith(" ") ? rest.slice(1) : rest);
  }

  return attributes;
}

/** Vendor attributes used as copyright fallbacks: Implementation-Vendor first, then Bundle-Vendor. */
export function scanManifest(text: string): string[] {
  const attributes = parseManifestMainAttributes(text);
  const out: string[] = [];
  for (const name of [IMPLEMENTATION_VENDOR, BUNDLE_VENDOR]) {
    const value = attributes.get(name)?.trim();
    if (value) out.push(value);
  }
  return out;
}
