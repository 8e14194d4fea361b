import { describe, expect, it } from "vitest";
import { AgentInvocationError } from "../src/troupe/agents/types.js";
import { definePipeline } from "../src/troupe/config/schemas.js";
import { keywordTermination } from "../src/troupe/pipeline/strategies/index.js";
import { StubAgents } from "./helpers/stubAgents.js";

describe("group chat strategy", () => {
  it("runs exactly max_rounds rounds without a termination predicate", async () => {
    const stubs = new StubAgents();
    stubs.define("alice", (_m, call) => `alice ${call}`);
    stubs.define("bob", (_m, call) => `bob ${call}`);
    stubs.define("carol", (_m, call) => `carol ${call}`);
    const spec = definePipeline({ name: "chat", agents: ["alice", "bob", "carol"], strategy: "group_chat", maxRounds: 2 });

    const result = await stubs.engine().run(spec, "discuss", stubs.roster());

    expect(result.reason).toBe("max_rounds_exceeded");
    expect(result.transcript).toHaveLength(1 + 2 * 3);
    expect(result.transcript.map((t) => t.speaker)).toEqual(["task", "alice", "bob", "carol", "alice", "bob", "carol"]);
    expect(result.content).toBe("carol 2");
    expect(result.finalAgent).toBe("carol");
  });

  it("shows every agent the full transcript so far", async () => {
    const stubs = new StubAgents();
    stubs.define("alice", () => "hi");
    stubs.define("bob", () => "hello");
    const spec = definePipeline({ name: "chat", agents: ["alice", "bob"], strategy: "group_chat", maxRounds: 1 });

    await stubs.engine().run(spec, "greet", stubs.roster());

    expect(stubs.calls.get("alice")).toEqual([[{ speaker: "task", content: "greet" }]]);
    expect(stubs.calls.get("bob")).toEqual([
      [
        { speaker: "task", content: "greet" },
        { speaker: "alice", content: "hi" }
      ]
    ]);
  });

  it("ends as soon as the termination predicate accepts a turn", async () => {
    const stubs = new StubAgents();
    stubs.define("writer", (_m, call) => `draft ${call}`);
    stubs.define("critic", (_m, call) => (call === 2 ? "looks good APPROVED" : "needs work"));
    const spec = definePipeline({
      name: "review",
      agents: ["writer", "critic"],
      strategy: "group_chat",
      maxRounds: 5,
      terminationKeyword: "APPROVED"
    });

    const result = await stubs.engine().run(spec, "write a haiku", stubs.roster());

    expect(result.reason).toBe("completed");
    expect(result.content).toBe("looks good APPROVED");
    expect(result.finalAgent).toBe("critic");
    expect(result.transcript).toHaveLength(5);
    expect(stubs.callCount("writer")).toBe(2);
  });

  it("prefers a predicate passed at run time over the configured keyword", async () => {
    const stubs = new StubAgents();
    stubs.define("a", (_m, call) => `a${call} APPROVED`);
    stubs.define("b", (_m, call) => `b${call}`);
    const spec = definePipeline({
      name: "override",
      agents: ["a", "b"],
      strategy: "group_chat",
      maxRounds: 3,
      terminationKeyword: "APPROVED"
    });

    const result = await stubs.engine().run(spec, "go", stubs.roster(), {
      terminate: (turn) => turn.content === "b2"
    });

    expect(result.reason).toBe("completed");
    expect(result.content).toBe("b2");
    expect(result.transcript).toHaveLength(5);
  });

  it("stops the whole chat when one agent fails", async () => {
    const stubs = new StubAgents();
    stubs.define("a", () => "ok");
    stubs.define("b", (_m, call) => {
      if (call === 2) throw new AgentInvocationError("timeout", "took too long", { agent: "b" });
      return "fine";
    });
    const spec = definePipeline({ name: "fragile", agents: ["a", "b"], strategy: "group_chat", maxRounds: 4 });

    const result = await stubs.engine().run(spec, "go", stubs.roster());

    expect(result.reason).toBe("agent_failed");
    expect(result.error?.type).toBe("timeout");
    expect(result.transcript.map((t) => t.speaker)).toEqual(["task", "a", "b", "a"]);
  });
});

describe("keywordTermination", () => {
  const approved = keywordTermination("APPROVED");

  it("matches a reply that ends with the keyword after trimming", () => {
    expect(approved({ content: "All set. APPROVED \n" })).toBe(true);
  });

  it("ignores the keyword anywhere else", () => {
    expect(approved({ content: "APPROVED? not yet" })).toBe(false);
  });
});
