import { readFileSync } from "node:fs";

let cachedVersion: string | undefined;

export function readPackageVersion(): string {
  if (cachedVersion !== undefined) {
    return cachedVersion;
  }

  const manifest: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf8"),
  );
  if (
    typeof manifest !== "object" ||
    manifest === null ||
    !("version" in manifest) ||
    typeof manifest.version !== "string"
  ) {
    throw new Error("package.json has no version field.");
  }

  cachedVersion = manifest.version;
  return cachedVersion;
}
