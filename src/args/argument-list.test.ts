import { describe, expect, it } from "vitest";

import { ArgumentListBuilder } from "./argument-list.js";

describe("ArgumentListBuilder", () => {
  it("masks sensitive key/value pairs in the mask array and in toString", () => {
    const args = new ArgumentListBuilder("ant").addKeyValuePairs(
      "-D",
      { user: "builder", password: "test-secret" },
      new Set(["password"]),
    );

    expect(args.toList()).toEqual(["ant", "-Duser=builder", "-Dpassword=test-secret"]);
    expect(args.toMaskArray()).toEqual([false, false, true]);
    expect(args.toString()).toBe("ant -Duser=builder ********");
  });

  it("expands macros after parsing property text so backslashes survive", () => {
    const values: Record<string, string> = { WORKSPACE: "C:\\ws", NAME: "app" };
    const args = new ArgumentListBuilder().addKeyValuePairsFromPropertyString(
      "-D",
      "dir=${WORKSPACE}/out\nname=$NAME",
      (name) => values[name],
    );

    expect(args.toList()).toEqual(["-Ddir=C:\\ws/out", "-Dname=app"]);
  });

  it("masks property-text entries whose expanded key is sensitive", () => {
    const values: Record<string, string> = { KEY: "token" };
    const args = new ArgumentListBuilder().addKeyValuePairsFromPropertyString(
      "-D",
      "$KEY=test-secret",
      (name) => values[name],
      new Set(["token"]),
    );

    expect(args.toArguments()).toEqual([{ token: "-Dtoken=test-secret", masked: true }]);
  });

  it("adds tokenized targets", () => {
    const args = new ArgumentListBuilder("ant").addTokenized('clean "-Dmsg=a b" dist');

    expect(args.toList()).toEqual(["ant", "clean", "-Dmsg=a b", "dist"]);
  });

  it("quotes empty and spaced tokens in toString", () => {
    expect(new ArgumentListBuilder("a", "", "b c").toString()).toBe('a "" "b c"');
  });

  it("clones independently", () => {
    const original = new ArgumentListBuilder("ant");
    const copy = original.clone().add("dist");

    expect(original.toList()).toEqual(["ant"]);
    expect(copy.toList()).toEqual(["ant", "dist"]);
  });
});

describe("ArgumentListBuilder.toWindowsCommand", () => {
  it("wraps the command for cmd.exe and reports ERRORLEVEL", () => {
    const args = new ArgumentListBuilder(
      "ant.bat",
      "-file",
      "build.xml",
      "-Dmsg=hello world",
      "dist",
    );

    expect(args.toWindowsCommand().toList()).toEqual([
      "cmd.exe",
      "/C",
      '"ant.bat',
      "-file",
      "build.xml",
      '"-Dmsg=hello world"',
      "dist",
      "&&",
      "exit",
      '%%ERRORLEVEL%%"',
    ]);
  });

  it("double-quotes a first token that needs quoting", () => {
    const args = new ArgumentListBuilder("C:\\Program Files\\ant\\bin\\ant.bat");

    expect(args.toWindowsCommand().toList()[2]).toBe('""C:\\Program Files\\ant\\bin\\ant.bat"');
  });

  it("breaks up %VAR% references when asked", () => {
    const args = new ArgumentListBuilder("ant", "%PATH%");

    expect(args.toWindowsCommand(true).toList()[3]).toBe('"%"P"ATH%"');
    expect(args.toWindowsCommand().toList()[3]).toBe("%PATH%");
  });

  it("carries masks over to the wrapped tokens", () => {
    const args = new ArgumentListBuilder("ant").addMasked("-Dpw=test-secret").add("dist");

    expect(args.toWindowsCommand().toMaskArray()).toEqual([
      false,
      false,
      false,
      true,
      false,
      false,
      false,
      false,
    ]);
  });
});
