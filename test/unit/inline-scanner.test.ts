import { describe, test, expect, vi } from "vitest";
import {
  buildCallPattern,
  findLiterals,
  scanInline,
  spliceRanges,
} from "../../src/core/inlineScanner";
import { Logger } from "../../src/utils/logger";

const english: Record<string, string> = {
  Hola: "Hello",
  Adiós: "Goodbye",
  "Hola %{nombre}": "Hello %{nombre}",
  t: "T",
};

// Translates known Spanish strings and echoes everything else
const translate = vi.fn(async (text: string) => english[text] ?? text);

describe("findLiterals", () => {
  test("should locate the payload of a gettext call", () => {
    expect(findLiterals('gettext("Hola")')).toEqual([
      {
        text: 'gettext("Hola")',
        payload: "Hola",
        start: 0,
        end: 15,
        payloadStart: 9,
        payloadEnd: 13,
      },
    ]);
  });

  test("should accept spacing and trailing arguments", () => {
    const source = 'msg = gettext ( "Hola %{nombre}", nombre: user.name )';

    const [literal] = findLiterals(source);

    expect(literal.payload).toBe("Hola %{nombre}");
    expect(literal.text).toBe(
      'gettext ( "Hola %{nombre}", nombre: user.name )'
    );
    expect(source.slice(literal.payloadStart, literal.payloadEnd)).toBe(
      "Hola %{nombre}"
    );
  });

  test("should keep escaped quotes inside the payload", () => {
    const [literal] = findLiterals('gettext("Di \\"hola\\"")');

    expect(literal.payload).toBe('Di \\"hola\\"');
  });

  test("should return matches in source order", () => {
    const source = 'a = gettext("Hola")\nb = gettext("Adiós")';

    expect(findLiterals(source).map((literal) => literal.payload)).toEqual([
      "Hola",
      "Adiós",
    ]);
  });

  test("should not match other functions that end in gettext", () => {
    expect(findLiterals('dgettext("errors", "Hola")')).toEqual([]);
    expect(findLiterals("gettext(variable)")).toEqual([]);
  });

  test("should look for custom function names", () => {
    const pattern = buildCallPattern(["t", "_"]);

    expect(
      findLiterals('t("Hola") <> _("Adiós") <> gettext("x")', pattern).map(
        (literal) => literal.payload
      )
    ).toEqual(["Hola", "Adiós"]);
  });
});

describe("spliceRanges", () => {
  test("should replace ranges by offset", () => {
    expect(
      spliceRanges("aa bb aa", [
        { start: 0, end: 2, text: "X" },
        { start: 6, end: 8, text: "YY" },
      ])
    ).toBe("X bb YY");
  });

  test("should return the content unchanged without ranges", () => {
    expect(spliceRanges("aa bb", [])).toBe("aa bb");
  });
});

describe("scanInline", () => {
  test("should translate a literal in place", async () => {
    const result = await scanInline('gettext("Hola")', {
      translate,
      dryRun: false,
    });

    expect(result.content).toBe('gettext("Hello")');
    expect(result.changed).toBe(true);
    expect(result.changeSet).toEqual([
      {
        lineNumber: 1,
        original: 'gettext("Hola")',
        modified: 'gettext("Hello")',
      },
    ]);
  });

  test("should change nothing on a second run", async () => {
    const first = await scanInline('gettext("Hola")', {
      translate,
      dryRun: false,
    });
    const second = await scanInline(first.content, {
      translate,
      dryRun: false,
    });

    expect(second.changed).toBe(false);
    expect(second.content).toBe('gettext("Hello")');
  });

  test("should only replace the payload inside its own call", async () => {
    const source = 'gettext("t") <> "Hola" <> gettext("Hola")';

    const result = await scanInline(source, { translate, dryRun: false });

    expect(result.content).toBe('gettext("T") <> "Hola" <> gettext("Hello")');
  });

  test("should translate every occurrence of a repeated call", async () => {
    const source = 'a = gettext("Hola")\nb = gettext("Hola")\n';

    const result = await scanInline(source, { translate, dryRun: false });

    expect(result.content).toBe(
      'a = gettext("Hello")\nb = gettext("Hello")\n'
    );
    expect(result.changeSet.map((change) => change.lineNumber)).toEqual([
      1, 2,
    ]);
  });

  test("should keep trailing arguments", async () => {
    const result = await scanInline(
      'gettext("Hola %{nombre}", nombre: name)',
      { translate, dryRun: false }
    );

    expect(result.content).toBe('gettext("Hello %{nombre}", nombre: name)');
  });

  test("should escape quotes introduced by the translation", async () => {
    const result = await scanInline('gettext("Di hola")', {
      translate: async () => 'Say "hello"',
      dryRun: false,
    });

    expect(result.content).toBe('gettext("Say \\"hello\\"")');
  });

  test("should keep a multi-line reply inside the literal", async () => {
    const result = await scanInline('msg = gettext("Hola")\nok()', {
      translate: async () => "Hello\r\nWorld",
      dryRun: false,
    });

    expect(result.content).toBe('msg = gettext("Hello\\r\\nWorld")\nok()');
    expect(result.changeSet).toEqual([
      {
        lineNumber: 1,
        original: 'msg = gettext("Hola")',
        modified: 'msg = gettext("Hello\\r\\nWorld")',
      },
    ]);
  });

  test("should warn when placeholders are lost", async () => {
    const logger = new Logger(false);
    const warn = vi.spyOn(logger, "warn");

    await scanInline('gettext("Hola %{nombre}")', {
      translate: async () => "Hello",
      dryRun: false,
      logger,
    });

    expect(warn).toHaveBeenCalledWith(
      '⚠️ Placeholders differ between "Hola %{nombre}" and "Hello"'
    );
  });

  test("should log changes in scope INLINE", async () => {
    const logger = new Logger(false);
    const logChange = vi.spyOn(logger, "logChange");

    await scanInline('gettext("Hola") <> gettext("Hello")', {
      translate,
      dryRun: true,
      logger,
    });

    expect(logChange.mock.calls).toEqual([["Hola", "Hello", "INLINE", true]]);
  });
});
