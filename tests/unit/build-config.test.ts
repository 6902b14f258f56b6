import { readFileSync } from "node:fs";
import { describe, it, expect } from "vitest";

function readRootFile(name: string): string {
  return readFileSync(new URL(`../../${name}`, import.meta.url), "utf8");
}

describe("production build", () => {
  it("compiles sources and scripts only", () => {
    const buildConfig: unknown = JSON.parse(readRootFile("tsconfig.build.json"));
    const manifest: unknown = JSON.parse(readRootFile("package.json"));

    expect(buildConfig).toMatchObject({
      extends: "./tsconfig.json",
      include: ["src/**/*.ts", "scripts/**/*.ts"],
    });
    expect(manifest).toMatchObject({ scripts: { build: "tsc -p tsconfig.build.json" } });
  });

  it("keeps tests out of the image", () => {
    const copies = readRootFile("Dockerfile")
      .split("\n")
      .filter((line) => line.startsWith("COPY "));

    expect(copies).toEqual([
      "COPY package.json ./",
      "COPY tsconfig.json tsconfig.build.json ./",
      "COPY src ./src",
      "COPY scripts ./scripts",
    ]);
  });
});
