import path from "node:path";

import { describe, expect, it } from "vitest";

import { FakeNode } from "../../test/helpers/fake-node.js";
import { StepConfigurationError } from "../core/errors.js";

import { chooseBuildFile, resolveBuildFile } from "./build-file.js";

describe("resolveBuildFile", () => {
  it("prefers the explicit build file", () => {
    expect(resolveBuildFile("/ws", "sub/main.xml", "-f other.xml", path.posix)).toBe(
      "/ws/sub/main.xml",
    );
  });

  it("falls back to a -f, -file or -buildfile flag in the targets", () => {
    expect(resolveBuildFile("/ws", undefined, "-f custom.xml clean", path.posix)).toBe(
      "/ws/custom.xml",
    );
    expect(resolveBuildFile("/ws", undefined, "clean -buildfile x/y.xml", path.posix)).toBe(
      "/ws/x/y.xml",
    );
  });

  it("defaults to build.xml and ignores a trailing flag without a value", () => {
    expect(resolveBuildFile("/ws", undefined, "clean -file", path.posix)).toBe("/ws/build.xml");
  });

  it("uses the node's path rules", () => {
    expect(resolveBuildFile("C:\\ws", undefined, "", path.win32)).toBe("C:\\ws\\build.xml");
  });
});

describe("chooseBuildFile", () => {
  it("finds the build file under the module root first", async () => {
    const node = new FakeNode({ files: ["/ws/mod/build.xml", "/ws/build.xml"] });

    await expect(
      chooseBuildFile({ moduleRoot: "/ws/mod", workspace: "/ws", targets: "", node }),
    ).resolves.toEqual({ path: "/ws/mod/build.xml", exists: true });
  });

  it("falls back to the workspace root", async () => {
    const node = new FakeNode({ files: ["/ws/build.xml"] });

    await expect(
      chooseBuildFile({ moduleRoot: "/ws/mod", workspace: "/ws", targets: "", node }),
    ).resolves.toEqual({ path: "/ws/build.xml", exists: true });
  });

  it("reports the workspace candidate when nothing exists and no build file is set", async () => {
    const node = new FakeNode();

    await expect(
      chooseBuildFile({ moduleRoot: "/ws/mod", workspace: "/ws", targets: "", node }),
    ).resolves.toEqual({ path: "/ws/build.xml", exists: false });
  });

  it("tries the raw build file path last, as an absolute path", async () => {
    const raw = path.posix.resolve("shared/build.xml");
    const node = new FakeNode({ files: [raw] });

    await expect(
      chooseBuildFile({
        moduleRoot: "/ws/mod",
        workspace: "/ws",
        buildFile: "shared/./build.xml",
        targets: "",
        node,
      }),
    ).resolves.toEqual({ path: raw, exists: true });
  });

  it("gives the same answer when asked twice", async () => {
    const node = new FakeNode({ files: ["/ws/build.xml"] });
    const input = { moduleRoot: "/ws/mod", workspace: "/ws", targets: "-f build.xml", node };

    const first = await chooseBuildFile(input);
    const second = await chooseBuildFile(input);

    expect(second).toEqual(first);
    expect(first).toEqual({ path: "/ws/build.xml", exists: true });
  });

  it("fails when the node holds no workspace", async () => {
    const node = new FakeNode();

    await expect(
      chooseBuildFile({ moduleRoot: "/ws", workspace: null, targets: "", node }),
    ).rejects.toThrowError(
      new StepConfigurationError("Workspace is not available. Agent may be disconnected."),
    );
  });
});
