import { describe, expect, it } from "vitest";
import { DEFAULT_OPTIONS, resolveBundleOptions } from "../src/cli/utils/options";

describe("resolveBundleOptions", () => {
  it("falls back to defaults", () => {
    expect(resolveBundleOptions(null, {}, {})).toEqual({
      input: "",
      output: undefined,
      prefix: undefined,
      ...DEFAULT_OPTIONS,
    });
  });

  it("prefers flags over env over config", () => {
    const config = { input: "/cfg", output: "/cfg.ts", prefix: "cfg", runtime: "cfg-runtime", recursive: false };
    const env = { EMBEDPACK_INPUT: "/env", EMBEDPACK_PREFIX: "env", EMBEDPACK_RECURSIVE: "yes" };

    const options = resolveBundleOptions(config, { input: "/flag" }, env);

    expect(options.input).toBe("/flag");
    expect(options.prefix).toBe("env");
    expect(options.output).toBe("/cfg.ts");
    expect(options.runtime).toBe("cfg-runtime");
    expect(options.recursive).toBe(true);
  });

  it("lets an explicit false flag win over env and config", () => {
    const options = resolveBundleOptions({ compress: true }, { compress: false }, { EMBEDPACK_COMPRESS: "1" });
    expect(options.compress).toBe(false);
  });

  it("parses boolean env values and ignores unknown ones", () => {
    expect(resolveBundleOptions(null, {}, { EMBEDPACK_DEBUG: "ON" }).debug).toBe(true);
    expect(resolveBundleOptions(null, {}, { EMBEDPACK_COMPRESS: "off" }).compress).toBe(false);
    expect(resolveBundleOptions({ debug: true }, {}, { EMBEDPACK_DEBUG: "maybe" }).debug).toBe(true);
  });

  it("reads package and entry from flags and config only", () => {
    const options = resolveBundleOptions({ package: "web", entry: "files" }, { entry: "site" }, {});
    expect(options.package).toBe("web");
    expect(options.entry).toBe("site");
  });

  it("treats empty strings as unset", () => {
    expect(resolveBundleOptions({ input: "/cfg" }, { input: "" }, { EMBEDPACK_INPUT: "" }).input).toBe("/cfg");
  });
});
