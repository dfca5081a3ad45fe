import { buildDependencyGraph, nodeDepths } from "../src/depgraph/buildDependencyGraph.js";
import { projectAlias, simplifyLabel } from "../src/depgraph/labels.js";
import { parseDump } from "../src/depgraph/parseDump.js";
import { renderDependencyDiagram } from "../src/depgraph/renderDependencyDiagram.js";
import { parseDiagram } from "../src/diagram/parseDiagram.js";
import { BuildError } from "../src/errors/index.js";
import { degreeMap } from "../src/graph/graph.js";

const SCENARIO_A = "X@1.0 Y@2.0\nY@2.0 Z@3.0\n";

const CONTAINERS = [
  "github.com/containers/podman/v5@v5.0.1 github.com/containers/storage@v1.51.0",
  "github.com/containers/podman/v5@v5.0.1 github.com/sirupsen/logrus@v1.9.3",
  "github.com/containers/storage@v1.51.0 github.com/containers/image/v5@v5.29.0",
  "github.com/containers/storage@v1.51.0 github.com/klauspost/compress@v1.17.4",
  "",
].join("\n");

describe("parseDump", () => {
  it("skips blanks and comments and warns on malformed lines", () => {
    const { entries, warnings } = parseDump("a b c\n@v1 b\nok@1 fine@2\n# comment\n\n");
    expect(entries).toEqual([
      { line: 3, producer: { name: "ok", version: "1" }, consumer: { name: "fine", version: "2" } },
    ]);
    expect(warnings).toEqual([
      { line: 1, message: "expected 2 tokens, found 3", text: "a b c" },
      { line: 2, message: "malformed module@version token", text: "@v1 b" },
    ]);
  });

  it("tokens without a version are accepted", () => {
    expect(parseDump("root dep@v1\n").entries[0].producer).toEqual({ name: "root" });
  });
});

describe("labels", () => {
  it("simplifyLabel strips the host and version and splits organisation from project", () => {
    expect(simplifyLabel("github.com/containers/podman/v5@v5.0.1")).toBe("containers | podman/v5");
    expect(simplifyLabel("golang.org/x/sys@v0.1.0")).toBe("golang.org | x/sys");
    expect(simplifyLabel("X")).toBe("X");
  });

  it("projectAlias keys a label by its project part", () => {
    expect(projectAlias("rootless-containers | rootlesskit/v2")).toBe("rootlesskit_v2_");
    expect(projectAlias("X")).toBe("X_");
  });
});

describe("buildDependencyGraph", () => {
  it("scenario A: allow-list plus isolated removal keeps X -> Y only", () => {
    const { graph, warnings } = buildDependencyGraph(SCENARIO_A, { packages: ["X", "Y"], removeIsolated: true });
    expect(warnings).toEqual([]);
    expect(graph.nodes).toEqual([
      { id: "X", label: "X", kind: "component", namespace: [], version: "1.0" },
      { id: "Y", label: "Y", kind: "component", namespace: [], version: "2.0" },
    ]);
    expect(graph.edges).toEqual([{ from: "X", to: "Y", style: "solid-association" }]);
  });

  it("builds safe ids, simplified labels and consumer versions on edges", () => {
    const { graph } = buildDependencyGraph(CONTAINERS, { showVersion: true });
    expect(graph.nodes[0]).toEqual({
      id: "github_com_containers_podman_v5",
      label: "containers | podman/v5",
      kind: "component",
      namespace: [],
      version: "v5.0.1",
    });
    expect(graph.edges[0]).toEqual({
      from: "github_com_containers_podman_v5",
      to: "github_com_containers_storage",
      style: "solid-association",
      version: "v1.51.0",
    });
    expect(graph.nodes).toHaveLength(5);
    expect(graph.edges).toHaveLength(4);
  });

  it("filter soundness: every surviving node starts with an allowed prefix", () => {
    const { graph } = buildDependencyGraph(CONTAINERS, { packages: ["github.com/containers/"] });
    expect(graph.nodes.map((n) => n.id)).toEqual([
      "github_com_containers_podman_v5",
      "github_com_containers_storage",
      "github_com_containers_image_v5",
    ]);
    expect(graph.nodes.every((n) => n.id.startsWith("github_com_containers"))).toBe(true);
    expect(graph.edges).toHaveLength(2);
  });

  it("\"*\" in the allow-list keeps everything; the deny-list still applies", () => {
    const { graph } = buildDependencyGraph(CONTAINERS, {
      packages: ["*"],
      hidePackages: ["github.com/containers/storage"],
    });
    expect(graph.nodes.map((n) => n.id)).not.toContain("github_com_containers_storage");
    expect(graph.nodes).toHaveLength(4);
    expect(graph.edges).toEqual([
      { from: "github_com_containers_podman_v5", to: "github_com_sirupsen_logrus", style: "solid-association" },
    ]);
  });

  it("isolation invariant: no node is left without an incident edge", () => {
    const { graph } = buildDependencyGraph(CONTAINERS, {
      hidePackages: ["github.com/containers/storage"],
      removeIsolated: true,
    });
    const degrees = degreeMap(graph);
    expect(graph.nodes.map((n) => n.id)).toEqual(["github_com_containers_podman_v5", "github_com_sirupsen_logrus"]);
    expect(graph.nodes.every((n) => (degrees.get(n.id) ?? 0) > 0)).toBe(true);
  });

  it("maxDepth keeps nodes within N hops of a root", () => {
    const dump = "a b\nb c\nc d\n";
    const { graph } = buildDependencyGraph(dump, { maxDepth: 1 });
    expect(graph.nodes.map((n) => n.id)).toEqual(["a", "b"]);
    expect(graph.edges).toHaveLength(1);
  });

  it("a graph without roots treats every node as depth zero", () => {
    const { graph } = buildDependencyGraph("a b\nb a\n", { maxDepth: 0 });
    expect(nodeDepths(graph)).toEqual(
      new Map([
        ["a", 0],
        ["b", 0],
      ]),
    );
    expect(graph.edges).toHaveLength(2);
  });

  it("directOf keeps only edges leaving the given module", () => {
    const { graph } = buildDependencyGraph("a b\na c\nb c\nd a\n", { directOf: "a" });
    expect(graph.nodes.map((n) => n.id)).toEqual(["a", "b", "c"]);
    expect(graph.edges.map((e) => `${e.from}->${e.to}`)).toEqual(["a->b", "a->c"]);
  });

  it("directOf naming a missing module is a BuildError", () => {
    expect(() => buildDependencyGraph("a b\n", { directOf: "zzz" })).toThrow(BuildError);
  });

  it("projectAliases merges modules sharing a project name", () => {
    const dump = [
      "github.com/a/app github.com/a/lib",
      "github.com/a/app github.com/b/lib",
      "github.com/a/lib github.com/b/lib",
    ].join("\n");
    const { graph } = buildDependencyGraph(dump, { projectAliases: true });
    expect(graph.nodes).toEqual([
      { id: "app_", label: "a | app", kind: "component", namespace: [] },
      { id: "lib_", label: "a | lib", kind: "component", namespace: [] },
    ]);
    expect(graph.edges).toEqual([{ from: "app_", to: "lib_", style: "solid-association" }]);
  });

  it("an empty dump is a BuildError with reason empty-dump", () => {
    let reason: string | undefined;
    try {
      buildDependencyGraph("# nothing here\n\n");
    } catch (err) {
      if (err instanceof BuildError) reason = err.reason;
    }
    expect(reason).toBe("empty-dump");
  });

  it("filters that remove every node raise BuildError with reason empty-graph", () => {
    expect(() => buildDependencyGraph(SCENARIO_A, { packages: ["nomatch"] })).toThrow("filters removed all 3 modules");
  });
});

describe("renderDependencyDiagram", () => {
  const scenarioA = () => buildDependencyGraph(SCENARIO_A, { packages: ["X", "Y"], removeIsolated: true }).graph;

  it("writes a PlantUML diagram with the naming-scheme header", () => {
    expect(renderDependencyDiagram(scenarioA())).toBe(
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
  });

  it("the written diagram parses back into the same graph", () => {
    const built = buildDependencyGraph(CONTAINERS, { showVersion: true }).graph;
    const parsed = parseDiagram(renderDependencyDiagram(built, { showVersion: true, title: "Podman" }));
    expect(parsed.warnings).toEqual([]);
    expect(parsed.graph.nodes.map((n) => n.id).sort()).toEqual(built.nodes.map((n) => n.id).sort());
    expect(parsed.graph.edges.map((e) => `${e.from}->${e.to}:${e.label ?? ""}`)).toEqual([
      "github_com_containers_podman_v5->github_com_containers_storage:v1.51.0",
      "github_com_containers_podman_v5->github_com_sirupsen_logrus:v1.9.3",
      "github_com_containers_storage->github_com_containers_image_v5:v5.29.0",
      "github_com_containers_storage->github_com_klauspost_compress:v1.17.4",
    ]);
  });

  it("mermaid output carries the title as front matter", () => {
    expect(renderDependencyDiagram(scenarioA(), { format: "mermaid" })).toBe(
      ["---", "title: Generated Architecture", "---", "graph LR", '  X["X"]', '  Y["Y"]', "  X --> Y", ""].join("\n"),
    );
  });
});
