import { GraphError } from "../src/errors/index.js";
import { GraphBuilder, degreeMap, namespaceTree, removeIsolated } from "../src/graph/graph.js";
import { canonicalId, canonicalLabelId, safeId, safePrefix } from "../src/graph/identity.js";

describe("GraphBuilder", () => {
  it("keeps the first node for a taken id and allows parallel edges", () => {
    const b = new GraphBuilder();
    expect(b.addNode({ id: "a", label: "first", kind: "component", namespace: [] })).toBe(true);
    expect(b.addNode({ id: "a", label: "second", kind: "class", namespace: [] })).toBe(false);
    b.addNode({ id: "b", label: "b", kind: "component", namespace: [] });
    b.addEdge({ from: "a", to: "b", style: "solid-association" });
    b.addEdge({ from: "a", to: "b", style: "solid-association" });

    const g = b.build();
    expect(g.nodes.map((n) => n.label)).toEqual(["first", "b"]);
    expect(g.edges).toHaveLength(2);
    expect(Object.isFrozen(g.edges[0])).toBe(true);
  });

  it("an edge to a missing node is a GraphError", () => {
    const b = new GraphBuilder();
    b.addNode({ id: "a", label: "a", kind: "component", namespace: [] });
    expect(() => b.addEdge({ from: "a", to: "ghost", style: "solid-association" })).toThrow(GraphError);
    expect(() => b.addEdge({ from: "a", to: "ghost", style: "solid-association" })).toThrow(
      'edge a -> ghost references missing node "ghost"',
    );
  });

  it("self-loops count twice toward degree; isolated nodes are removable", () => {
    const b = new GraphBuilder();
    b.addNode({ id: "loop", label: "loop", kind: "component", namespace: [] });
    b.addNode({ id: "alone", label: "alone", kind: "component", namespace: [] });
    b.addEdge({ from: "loop", to: "loop", style: "composition" });

    const g = b.build();
    expect(degreeMap(g)).toEqual(
      new Map([
        ["loop", 2],
        ["alone", 0],
      ]),
    );
    expect(removeIsolated(g).nodes.map((n) => n.id)).toEqual(["loop"]);
  });
});

describe("namespaceTree", () => {
  it("groups members under the path of their enclosing packages", () => {
    const b = new GraphBuilder();
    b.addNode({ id: "core", label: "Core", kind: "package", namespace: [] });
    b.addNode({ id: "core.db", label: "DB", kind: "component", namespace: ["Core"] });
    b.addNode({ id: "top", label: "Top", kind: "component", namespace: [] });
    b.addNode({ id: "x.y", label: "Y", kind: "component", namespace: ["X"] });

    const tree = namespaceTree(b.build());
    expect(tree.members.map((n) => n.id)).toEqual(["core", "top"]);
    expect(tree.children.map((c) => [c.name, c.members.map((n) => n.id)])).toEqual([
      ["Core", ["core.db"]],
      ["X", ["x.y"]],
    ]);
  });
});

describe("identity", () => {
  it("canonicalLabelId joins enclosing package labels with dots", () => {
    expect(canonicalLabelId("Redis Adapter", ["Core Services", "Cache"])).toBe("core_services.cache.redis_adapter");
    expect(canonicalLabelId("!!!", [])).toBe("");
  });

  it("canonicalId folds case and separators but keeps namespace dots", () => {
    expect(canonicalId("Podman-Core")).toBe("podmancore");
    expect(canonicalId("Core..Storage_Layer.")).toBe("core.storagelayer");
    expect(canonicalId("---")).toBe("---");
  });

  it("safeId and safePrefix map every non-alphanumeric to an underscore", () => {
    expect(safeId("github.com/containers/podman/v5")).toBe("github_com_containers_podman_v5");
    expect(safePrefix("github.com/containers/")).toBe("github_com_containers");
  });
});
