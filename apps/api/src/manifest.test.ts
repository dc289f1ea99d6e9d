import { access, readFile } from "node:fs/promises";
import { describe, it, expect } from "vitest";
import { z } from "zod";

const PACKAGE_DIR = new URL("../", import.meta.url);

const manifestSchema = z.object({
  main: z.string(),
  exports: z.unknown().optional(),
  scripts: z.record(z.string()),
  dependencies: z.record(z.string()),
  devDependencies: z.record(z.string()),
});

async function readManifest(): Promise<z.infer<typeof manifestSchema>> {
  const raw: unknown = JSON.parse(await readFile(new URL("package.json", PACKAGE_DIR), "utf8"));
  return manifestSchema.parse(raw);
}

describe("api package manifest", () => {
  it("points main at an entry point that exists", async () => {
    const manifest = await readManifest();

    expect(manifest.main).toBe("./src/main.ts");
    await expect(access(new URL(manifest.main, PACKAGE_DIR))).resolves.toBeUndefined();
    expect(manifest.exports).toBeUndefined();
  });

  it("starts the service from its entry point", async () => {
    const manifest = await readManifest();

    expect(manifest.scripts["start"]).toBe("node --import tsx src/main.ts");
    expect(manifest.dependencies["tsx"]).toBeDefined();
  });

  it("keeps test-only workspaces out of the runtime dependencies", async () => {
    const manifest = await readManifest();

    expect(manifest.dependencies["@indexflow/preprocessor"]).toBeUndefined();
    expect(manifest.devDependencies["@indexflow/preprocessor"]).toBe("0.1.0");
  });
});
