/**
 * reflexion build / compare: exit codes, written files and console output.
 */

import { existsSync, mkdtempSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { runBuild } from "../src/cli/runBuild.js";
import { runCompare, viewPath } from "../src/cli/runCompare.js";

describe("reflexion cli", () => {
  let dir: string;
  let stdout: string[];
  let stderr: string[];

  const logged = (): string[] => stdout;
  const errored = (): string[] => stderr;
  const write = (name: string, content: string): void => writeFileSync(join(dir, name), content, "utf8");

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "reflexion-cli-"));
    stdout = [];
    stderr = [];
    vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      stdout.push(args.map(String).join(" "));
    });
    vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
      stderr.push(args.map(String).join(" "));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("build", () => {
    it("scenario A → writes the filtered diagram, exit 0", () => {
      write("dump.txt", "X@1.0 Y@2.0\nY@2.0 Z@3.0\n");
      const code = runBuild(["dump.txt", "out.puml", "--packages", "X,Y", "--remove-isolated"], dir);

      expect(code).toBe(0);
      expect(readFileSync(join(dir, "out.puml"), "utf8")).toBe(
        [
          "@startuml",
          "skinparam componentStyle rectangle",
          "left to right direction",
          "title Generated Architecture",
          'legend "Naming scheme: Organisation | Project"',
          "",
          'component "X" as X',
          'component "Y" as Y',
          "",
          "X --> Y",
          "",
          "@enduml",
          "",
        ].join("\n"),
      );
      expect(logged()).toEqual(["reflexion build: wrote out.puml (2 nodes, 1 edges)"]);
    });

    it("--show-version labels edges; config file supplies the title", () => {
      write("dump.txt", "X@1.0 Y@2.0\n");
      write(".reflexion.yml", "build:\n  title: Podman\n");
      expect(runBuild(["dump.txt", "out/deps.puml", "--show-version"], dir)).toBe(0);

      const text = readFileSync(join(dir, "out", "deps.puml"), "utf8");
      expect(text).toContain("title Podman\n");
      expect(text).toContain("X --> Y : 2.0\n");
    });

    it("malformed lines are printed as warnings unless --quiet", () => {
      write("dump.txt", "a b c\nX Y\n");
      expect(runBuild(["dump.txt", "out.puml"], dir)).toBe(0);
      expect(errored()).toEqual(["reflexion build: warning line 1: expected 2 tokens, found 3 (a b c)"]);

      stderr.length = 0;
      expect(runBuild(["dump.txt", "out.puml", "--quiet"], dir)).toBe(0);
      expect(errored()).toEqual([]);
    });

    it("filters that remove everything → exit 1 with the cause", () => {
      write("dump.txt", "X@1.0 Y@2.0\n");
      expect(runBuild(["dump.txt", "out.puml", "--packages", "nomatch"], dir)).toBe(1);
      expect(errored()).toEqual(["reflexion build: filters removed all 2 modules"]);
      expect(existsSync(join(dir, "out.puml"))).toBe(false);
    });

    it("unreadable input → exit 1", () => {
      expect(runBuild(["missing.txt", "out.puml"], dir)).toBe(1);
      expect(errored()[0]).toMatch(/^reflexion build: cannot read .*missing\.txt/);
    });

    it("wrong argument count → exit 2 with usage", () => {
      expect(runBuild(["only-one.txt"], dir)).toBe(2);
      expect(errored()[0]).toBe("reflexion build: expected <dump> and <out>, got 1 argument(s)");
      expect(errored()[1]).toMatch(/^usage: reflexion build/);
    });

    it("invalid configuration → exit 2", () => {
      write("dump.txt", "X Y\n");
      write(".reflexion.yml", "build:\n  colour: red\n");
      expect(runBuild(["dump.txt", "out.puml"], dir)).toBe(2);
    });

    it("--format mermaid writes a flowchart", () => {
      write("dump.txt", "X Y\n");
      expect(runBuild(["dump.txt", "out.mmd", "--format", "mermaid", "--title", "Deps"], dir)).toBe(0);
      expect(readFileSync(join(dir, "out.mmd"), "utf8")).toBe(
        ["---", "title: Deps", "---", "graph LR", '  X["X"]', '  Y["Y"]', "  X --> Y", ""].join("\n"),
      );
    });

    it("an unknown --format → exit 2", () => {
      write("dump.txt", "X Y\n");
      expect(runBuild(["dump.txt", "out.svg", "--format", "svg"], dir)).toBe(2);
    });
  });

  describe("compare", () => {
    beforeEach(() => {
      write("a.puml", "component A\ncomponent B\nA --> B\n");
      write("b.puml", "component A2\ncomponent B\nA2 --> B\n");
    });

    it("prints both scores with four decimals", () => {
      expect(runCompare(["a.puml", "b.puml"], dir)).toBe(0);
      expect(logged()).toEqual([
        "Similarity score using structural approach: 0.3333",
        "Similarity score using textual approach: 0.3333",
      ]);
    });

    it("--json prints one stable object", () => {
      expect(runCompare(["a.puml", "b.puml", "--json", "--precision", "2"], dir)).toBe(0);
      expect(logged()).toEqual([
        '{"a":{"edges":1,"nodes":2,"path":"a.puml"},"b":{"edges":1,"nodes":2,"path":"b.puml"},' +
          '"structural":0.33,"textual":0.33,"warnings":0}',
      ]);
    });

    it("--visualize writes one view per input into --out-dir", () => {
      expect(runCompare(["a.puml", "b.puml", "--visualize", "--out-dir", "views"], dir)).toBe(0);
      expect(readFileSync(join(dir, "views", "a.view.mmd"), "utf8")).toBe(
        ["---", "title: a.puml", "---", "graph LR", '  a["A"]', '  b["B"]', "  a --> b", ""].join("\n"),
      );
      expect(existsSync(join(dir, "views", "b.view.mmd"))).toBe(true);
    });

    it("views land next to the input without --out-dir", () => {
      expect(viewPath("/work/diagrams/arch.puml", undefined)).toBe("/work/diagrams/arch.view.mmd");
      expect(viewPath("/work/diagrams/arch.puml", "/tmp/out")).toBe("/tmp/out/arch.view.mmd");
    });

    it("a diagram with no nodes → exit 1", () => {
      write("empty.puml", "@startuml\n@enduml\n");
      expect(runCompare(["a.puml", "empty.puml"], dir)).toBe(1);
      expect(errored()).toEqual(["reflexion compare: empty.puml: diagram contains no nodes"]);
    });

    it("an unbalanced block → exit 1", () => {
      write("broken.puml", "component A\n}\n");
      expect(runCompare(["a.puml", "broken.puml"], dir)).toBe(1);
      expect(errored()).toEqual(['reflexion compare: line 2: "}" closes no open block']);
    });

    it("--collapse groups namespaces before scoring", () => {
      write("c.puml", "package Core {\n  component X\n  component Y\n}\ncomponent UI\nUI --> X\n");
      write("d.puml", "package Core {\n  component Z\n}\ncomponent UI\nUI --> Z\n");
      expect(runCompare(["c.puml", "d.puml", "--collapse", "Core"], dir)).toBe(0);
      expect(logged()[0]).toBe("Similarity score using structural approach: 1.0000");
    });

    it("missing second file → exit 2", () => {
      expect(runCompare(["a.puml"], dir)).toBe(2);
    });
  });
});
