import { mkdir } from "node:fs/promises";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  FALLBACK_SLUG,
  allocateOutputDir,
  deriveOutputDir,
  slugFromSpec,
  slugify,
} from "../src/output/outputPath.js";
import { cleanupTempDirs, makeTempDir } from "./helpers.js";

afterEach(async () => {
  await cleanupTempDirs();
});

describe("slugify", () => {
  it("lowercases and collapses punctuation runs", () => {
    expect(slugify("Deploy a Secure S3 Bucket!!")).toBe("deploy-a-secure-s3-bucket");
  });

  it("trims leading and trailing separators", () => {
    expect(slugify("  --Hello,   World--  ")).toBe("hello-world");
  });

  it("falls back when nothing usable remains", () => {
    expect(slugify("!!! ???")).toBe(FALLBACK_SLUG);
    expect(slugify("")).toBe(FALLBACK_SLUG);
  });

  it("truncates without leaving a trailing hyphen", () => {
    expect(slugify("abcd efgh", 5)).toBe("abcd");
    expect(slugify("x".repeat(80))).toBe("x".repeat(60));
  });
});

describe("slugFromSpec", () => {
  it("uses only the first eight words", () => {
    expect(
      slugFromSpec("Create a VPC with two public subnets and one private subnet in eu-west-1"),
    ).toBe("create-a-vpc-with-two-public-subnets-and");
  });
});

describe("allocateOutputDir", () => {
  it("appends -2, -3 for existing directories", async () => {
    const base = await makeTempDir("outdir");
    const first = allocateOutputDir(base, "my-app");
    expect(first).toBe(path.join(base, "my-app"));

    await mkdir(first);
    const second = allocateOutputDir(base, "my-app");
    expect(second).toBe(path.join(base, "my-app-2"));

    await mkdir(second);
    expect(allocateOutputDir(base, "my-app")).toBe(path.join(base, "my-app-3"));
  });

  it("does not create the directory it returns", async () => {
    const base = await makeTempDir("outdir-pure");
    const dir = deriveOutputDir("Static website bucket", base);
    expect(dir).toBe(path.join(base, "static-website-bucket"));
    expect(allocateOutputDir(base, "static-website-bucket")).toBe(dir);
  });
});
