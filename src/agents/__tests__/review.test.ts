import { describe, it, expect } from "@jest/globals";
import { createDefectDetector, extractDefects } from "../review";

describe("createDefectDetector", () => {
  const detect = createDefectDetector();

  it("flags default markers case-insensitively", () => {
    expect(detect("DEFECT: missing import")).toBe(true);
    expect(detect("bug: crash on rotate")).toBe(true);
    expect(detect("The build would FAIL on API 21")).toBe(true);
    expect(detect("Issues found in onCreate")).toBe(true);
  });

  it("lets an explicit clean verdict win", () => {
    expect(detect("Looks fine. NO DEFECTS")).toBe(false);
    expect(detect("LGTM")).toBe(false);
    expect(detect("No issues found.")).toBe(false);
  });

  it("matches markers on word boundaries only", () => {
    expect(detect("failure handling is fine")).toBe(false);
  });

  it("treats an empty review as clean", () => {
    expect(detect("   ")).toBe(false);
  });

  it("uses configured markers instead of the defaults", () => {
    const custom = createDefectDetector(["TODO"]);
    expect(custom("TODO: handle rotation")).toBe(true);
    expect(custom("DEFECT: x")).toBe(false);
  });
});

describe("extractDefects", () => {
  it("collects DEFECT and BUG lines without their prefix", () => {
    expect(extractDefects("Summary\nDEFECT: missing import\n  bug: crash\nok")).toEqual(["missing import", "crash"]);
  });
});
