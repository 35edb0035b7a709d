import { describe, it, expect } from "@jest/globals";
import { extractCode, extractCodeBlocks, extractSourceFiles } from "../code-extract";

describe("extractCode", () => {
  const mixed = "Here:\n```kotlin\nclass A\n```\nand\n```java\nclass LongerJava {}\n```";

  it("prefers a block in the requested language", () => {
    expect(extractCode(mixed, "kotlin")).toBe("class A\n");
    expect(extractCode(mixed, "java")).toBe("class LongerJava {}\n");
  });

  it("accepts kt as a kotlin fence", () => {
    expect(extractCode("```kt\nval x = 1\n```", "kotlin")).toBe("val x = 1\n");
  });

  it("falls back to the longest block", () => {
    expect(extractCode("```\nshort\n```\n```\nmuch longer block\n```", "kotlin")).toBe("much longer block\n");
  });

  it("uses the raw text when there is no fence", () => {
    expect(extractCode("  class A  ", "kotlin")).toBe("class A\n");
  });
});

describe("extractCodeBlocks", () => {
  it("reports fence languages in lower case", () => {
    expect(extractCodeBlocks("```Kotlin\nx\n```")).toEqual([{ language: "kotlin", code: "x\n" }]);
  });
});

describe("extractSourceFiles", () => {
  it("splits labelled blocks into files with the main activity first", () => {
    const response = [
      "File: TodoStore.kt",
      "```kotlin",
      "class TodoStore",
      "```",
      "### `MainActivity.kt`",
      "```kotlin",
      "class MainActivity",
      "```",
      "```kotlin Item.kt",
      "data class Item(val title: String)",
      "```"
    ].join("\n");

    expect(extractSourceFiles(response, "kotlin")).toEqual([
      { name: "MainActivity.kt", contents: "class MainActivity\n" },
      { name: "Item.kt", contents: "data class Item(val title: String)\n" },
      { name: "TodoStore.kt", contents: "class TodoStore\n" }
    ]);
  });

  it("treats an unlabelled response as the main activity", () => {
    expect(extractSourceFiles("Here is the code:\n```java\nclass MainActivity {}\n```", "java")).toEqual([
      { name: "MainActivity.java", contents: "class MainActivity {}\n" }
    ]);
  });

  it("ignores labels for another language and keeps the last copy of a repeated name", () => {
    const response = "File: Helper.java\n```java\nclass Helper {}\n```\nFile: Util.kt\n```kotlin\nobject A\n```\nFile: Util.kt\n```kotlin\nobject B\n```";

    expect(extractSourceFiles(response, "kotlin")).toEqual([{ name: "Util.kt", contents: "object B\n" }]);
  });

  it("does not mistake prose that mentions a file for a label", () => {
    expect(extractCodeBlocks("I updated MainActivity.kt as follows:\n```kotlin\nclass A\n```")).toEqual([
      { language: "kotlin", code: "class A\n" }
    ]);
  });
});
