import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, test, expect } from "vitest";
import { javaFiles, MavenSourceLocator } from "../../../src/adapters/maven-source-locator.js";

async function touch(file: string): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, "class X {}\n", "utf-8");
}

describe("MavenSourceLocator", () => {
  let workspace: string;
  let locator: MavenSourceLocator;
  const main = () => path.join(workspace, "src/main/java");
  const tests = () => path.join(workspace, "src/test/java");

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(tmpdir(), "greenloop-locator-"));
    await touch(path.join(main(), "com/acme/Calculator.java"));
    await touch(path.join(tests(), "com/acme/CalculatorTest.java"));
    await touch(path.join(main(), "Legacy.java"));
    await touch(path.join(main(), "org/old/Helper.java"));
    locator = new MavenSourceLocator(workspace, ["src/main/java", "src/test/java"]);
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  test("maps a qualified name onto the package path", async () => {
    expect(await locator.find("com.acme.Calculator")).toBe(path.join(main(), "com/acme/Calculator.java"));
    expect(await locator.find("com.acme.CalculatorTest")).toBe(
      path.join(tests(), "com/acme/CalculatorTest.java"),
    );
  });

  test("nested classes resolve to their outer file", async () => {
    expect(await locator.find("com.acme.Calculator$Memory")).toBe(path.join(main(), "com/acme/Calculator.java"));
  });

  test("unqualified names are searched for", async () => {
    expect(await locator.find("Legacy")).toBe(path.join(main(), "Legacy.java"));
    expect(await locator.find("Helper")).toBe(path.join(main(), "org/old/Helper.java"));
  });

  test("unknown classes resolve to null", async () => {
    expect(await locator.find("com.acme.Missing")).toBeNull();
    expect(await locator.find("Missing")).toBeNull();
    expect(await locator.find("  ")).toBeNull();
  });

  test("javaFiles lists sources and tolerates a missing root", async () => {
    expect(await javaFiles(main())).toEqual([
      path.join(main(), "Legacy.java"),
      path.join(main(), "com/acme/Calculator.java"),
      path.join(main(), "org/old/Helper.java"),
    ]);
    expect(await javaFiles(path.join(workspace, "absent"))).toEqual([]);
  });
});
