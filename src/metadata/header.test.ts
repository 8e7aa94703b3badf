import { describe, expect, it } from "vitest";

import {
  createHeader,
  decodeScript,
  encodeScript,
  ensureHeader,
  emptyHeader,
  readHeader,
} from "./header.js";

const CANONICAL = [
  "# /// script",
  '# description = "Fetch the weather"',
  '# authors = ["someone"]',
  '# date = "2024-05-01"',
  '# requires-python = ">=3.11"',
  "# dependencies = [",
  '#   "requests>=2.31",',
  '#   "rich",',
  "# ]",
  '# tags = ["http", "weather"]',
  "# ///",
  "",
  "import requests",
  "",
].join("\n");

describe("decodeScript", () => {
  it("reads every known field and the body after the block", () => {
    const decoded = decodeScript(CANONICAL);

    expect(decoded.problem).toBeUndefined();
    expect(decoded.header).toEqual({
      description: "Fetch the weather",
      authors: ["someone"],
      createdDate: "2024-05-01",
      runtimeConstraint: ">=3.11",
      dependencies: ["requests>=2.31", "rich"],
      tags: ["http", "weather"],
      extraFields: [],
    });
    expect(decoded.body).toBe("import requests\n");
  });

  it("treats text without a block as having no header", () => {
    const decoded = decodeScript("print('hi')\n");

    expect(decoded).toEqual({ header: null, body: "print('hi')\n" });
    expect(readHeader("print('hi')\n")).toEqual(emptyHeader());
  });

  it("keeps duplicate dependencies in order and skips comments inside arrays", () => {
    const text = [
      "# /// script",
      "# dependencies = [",
      "#     # List any required packages here",
      "#   'httpx',",
      '#   "httpx",  # again',
      "# ]",
      "# ///",
      "print(1)",
    ].join("\n");

    const decoded = decodeScript(text);
    expect(decoded.header?.dependencies).toEqual(["httpx", "httpx"]);
    expect(decoded.body).toBe("print(1)");
  });

  it("preserves unknown keys and table sections verbatim", () => {
    const text = [
      "# /// script",
      '# dependencies = ["click"]',
      "# license = 'MIT'",
      "# extra = [",
      "#   1, 2,",
      "# ]",
      "# [tool.uv]",
      '# exclude-newer = "2024-01-01T00:00:00Z"',
      "# ///",
      "",
      "main()",
    ].join("\n");

    const decoded = decodeScript(text);

    expect(decoded.header?.dependencies).toEqual(["click"]);
    expect(decoded.header?.extraFields).toEqual([
      { key: "license", lines: ["license = 'MIT'"] },
      { key: "extra", lines: ["extra = [", "  1, 2,", "]"] },
      { key: "tool.uv", lines: ["[tool.uv]", 'exclude-newer = "2024-01-01T00:00:00Z"'] },
    ]);

    const encoded = encodeScript(decoded.header ?? emptyHeader(), decoded.body);
    expect(encoded).toBe(
      [
        "# /// script",
        '# dependencies = [',
        '#   "click",',
        "# ]",
        "# license = 'MIT'",
        "# extra = [",
        "#   1, 2,",
        "# ]",
        "# [tool.uv]",
        '# exclude-newer = "2024-01-01T00:00:00Z"',
        "# ///",
        "",
        "main()",
      ].join("\n"),
    );
  });

  it.each([
    ["an unclosed block", "# /// script\n# dependencies = []\nprint(1)\n", "closing"],
    ["a line without the comment prefix", "# /// script\ndependencies = []\n# ///\n", "prefix"],
    ["a non-string dependency", "# /// script\n# dependencies = [1]\n# ///\n", "dependencies"],
    ["a list where a string belongs", '# /// script\n# description = ["a"]\n# ///\n', "must be a string"],
    ["a duplicated key", '# /// script\n# tags = []\n# tags = ["x"]\n# ///\n', "twice"],
    ["an array that never closes", '# /// script\n# tags = [\n#  "x",\n# ///\n', "never closed"],
  ])("fails closed on %s", (_label, text, fragment) => {
    const decoded = decodeScript(text);

    expect(decoded.header).toBeNull();
    expect(decoded.body).toBe(text);
    expect(decoded.problem).toContain(fragment);
  });
});

describe("encodeScript", () => {
  it("reproduces a canonical script byte for byte", () => {
    const decoded = decodeScript(CANONICAL);

    expect(encodeScript(decoded.header ?? emptyHeader(), decoded.body)).toBe(CANONICAL);
  });

  it("is stable after one normalization pass", () => {
    const messy = [
      "# /// script",
      "# tags = [ 'b' , 'a' ]   ",
      "# dependencies = [ # none yet",
      "# ]",
      "# description = 'spaced'",
      "# ///",
      "",
      "",
      "",
      "run()",
    ].join("\n");

    const once = decodeScript(messy);
    const first = encodeScript(once.header ?? emptyHeader(), once.body);
    const twice = decodeScript(first);
    const second = encodeScript(twice.header ?? emptyHeader(), twice.body);

    expect(first).toBe(
      [
        "# /// script",
        '# description = "spaced"',
        "# dependencies = []",
        '# tags = ["b", "a"]',
        "# ///",
        "",
        "run()",
      ].join("\n"),
    );
    expect(second).toBe(first);
  });

  it("escapes quotes in string values", () => {
    const header = createHeader({ description: 'say "hi"' });
    const text = encodeScript(header, "print()\n");

    expect(text.split("\n")[1]).toBe('# description = "say \\"hi\\""');
    expect(decodeScript(text).header?.description).toBe('say "hi"');
  });
});

describe("ensureHeader", () => {
  it("attaches a header to a bare body", () => {
    const result = ensureHeader("print('x')\n", { description: "demo", tags: ["generated"] });

    expect(result.attached).toBe(true);
    expect(result.text).toBe(
      [
        "# /// script",
        '# description = "demo"',
        "# dependencies = []",
        '# tags = ["generated"]',
        "# ///",
        "",
        "print('x')",
        "",
      ].join("\n"),
    );
  });

  it("leaves a script that already has a header untouched", () => {
    const result = ensureHeader(CANONICAL, { description: "ignored" });

    expect(result.attached).toBe(false);
    expect(result.text).toBe(CANONICAL);
    expect(result.header.description).toBe("Fetch the weather");
  });

  it("reports a malformed header instead of stacking a second one", () => {
    const text = "# /// script\n# tags = [\n";
    const result = ensureHeader(text);

    expect(result.attached).toBe(false);
    expect(result.text).toBe(text);
    expect(result.problem).toBeDefined();
  });
});
