import { integerValue, parseArgs } from "../src/cli/args.js";
import { UsageError } from "../src/errors/index.js";

const FLAGS = {
  boolean: ["quiet"],
  single: ["max-depth", "title"],
  multi: ["packages"],
};

describe("parseArgs", () => {
  it("collects positionals, flags, single values and comma separated lists", () => {
    const args = parseArgs(
      ["dump.txt", "out.puml", "--packages", "a", "b,c", "--quiet", "--max-depth=3", "--title", "My Title"],
      FLAGS,
    );
    expect(args.positionals).toEqual(["dump.txt", "out.puml"]);
    expect(args.lists.get("packages")).toEqual(["a", "b", "c"]);
    expect(args.flags.has("quiet")).toBe(true);
    expect(args.values.get("title")).toBe("My Title");
    expect(integerValue(args, "max-depth", 0)).toBe(3);
  });

  it("--name=value form of a multi flag takes only that value", () => {
    const args = parseArgs(["--packages=x,y", "in", "out"], FLAGS);
    expect(args.lists.get("packages")).toEqual(["x", "y"]);
    expect(args.positionals).toEqual(["in", "out"]);
  });

  it("repeated multi flags accumulate", () => {
    expect(parseArgs(["--packages", "a", "--packages", "b"], FLAGS).lists.get("packages")).toEqual(["a", "b"]);
  });

  it("rejects unknown options and missing values", () => {
    expect(() => parseArgs(["--nope"], FLAGS)).toThrow("unknown option --nope");
    expect(() => parseArgs(["--title"], FLAGS)).toThrow("--title requires a value");
    expect(() => parseArgs(["--title", "--quiet"], FLAGS)).toThrow(UsageError);
    expect(() => parseArgs(["--packages", "--quiet"], FLAGS)).toThrow("--packages requires at least one value");
    expect(() => parseArgs(["--quiet=yes"], FLAGS)).toThrow("--quiet takes no value");
  });

  it("integer values must be whole numbers at or above the minimum", () => {
    expect(() => integerValue(parseArgs(["--max-depth", "-1"], FLAGS), "max-depth", 0)).toThrow(
      "--max-depth must be an integer >= 0",
    );
    expect(() => integerValue(parseArgs(["--max-depth", "2.5"], FLAGS), "max-depth", 0)).toThrow(UsageError);
    expect(integerValue(parseArgs([], FLAGS), "max-depth", 0)).toBeUndefined();
  });
});
