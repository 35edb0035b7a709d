import { describe, expect, it } from "@jest/globals";
import { normalizeArgv } from "../cli";

describe("normalizeArgv", () => {
  it("routes a bare prompt to create", () => {
    expect(normalizeArgv(["node", "apkforge", "a tip calculator"])).toEqual(["node", "apkforge", "create", "a tip calculator"]);
  });

  it("skips over option values before the prompt", () => {
    expect(normalizeArgv(["node", "apkforge", "--provider", "mock", "--accept-licenses", "Todo app"])).toEqual([
      "node",
      "apkforge",
      "--provider",
      "mock",
      "--accept-licenses",
      "create",
      "Todo app"
    ]);
  });

  it("leaves known commands and option-only calls alone", () => {
    expect(normalizeArgv(["node", "apkforge", "build", "./TodoListApp"])).toEqual(["node", "apkforge", "build", "./TodoListApp"]);
    expect(normalizeArgv(["node", "apkforge", "--version"])).toEqual(["node", "apkforge", "--version"]);
  });
});
