import axios from "axios";
import {
  AxiosMock,
  FakeDhcpNodes,
  createTestNode,
  createTestOptions,
} from "../../test/dhcp-fixtures";
import { DhcpConfigMutatorService } from "./config-mutator.service";
import { DhcpCycleReporterService } from "./cycle-reporter.service";
import type { DhcpControllerOptions, DhcpNodeConfig } from "./dhcp.types";
import { DhcpElectionEnforcerService } from "./election-enforcer.service";
import { DhcpHealthProbeService } from "./health-probe.service";
import { DhcpNodeHttpService } from "./node-http.service";
import { DhcpNodeSessionService } from "./node-session.service";

jest.mock("axios", () => {
  const mock = {
    request: jest.fn(),
    isAxiosError: (err: unknown) =>
      Boolean(err) && typeof err === "object" && "isAxiosError" in (err as object),
  };

  return { __esModule: true, default: mock };
});

describe("DhcpElectionEnforcerService", () => {
  const axiosMock = axios as unknown as AxiosMock;
  const A = "http://a.lan";
  const B = "http://b.lan";
  const C = "http://c.lan";

  let fake: FakeDhcpNodes;

  beforeEach(() => {
    jest.resetAllMocks();
    fake = new FakeDhcpNodes();
    axiosMock.request.mockImplementation(fake.handle);
  });

  function createEnforcer(
    nodes: DhcpNodeConfig[] = [createTestNode("a", 0), createTestNode("b", 1)],
    optionOverrides: Partial<DhcpControllerOptions> = {},
  ) {
    for (const node of nodes) {
      fake.add(node.baseUrl);
    }

    const options = createTestOptions(optionOverrides);
    const reporter = new DhcpCycleReporterService();
    const http = new DhcpNodeHttpService(options);
    const sessions = new DhcpNodeSessionService(http, options, reporter);
    const probe = new DhcpHealthProbeService(http, options, reporter);
    const mutator = new DhcpConfigMutatorService(
      http,
      sessions,
      options,
      reporter,
    );
    const enforcer = new DhcpElectionEnforcerService(
      nodes,
      options,
      probe,
      mutator,
      reporter,
    );

    return { enforcer, reporter, mutator };
  }

  it("enables the first node and disables the rest when all are reachable", async () => {
    const { enforcer } = createEnforcer();

    const report = await enforcer.runCycle();

    expect(report.electedNodeId).toBe("a");
    expect(fake.mutationsTo(A)).toEqual([true]);
    expect(fake.mutationsTo(B)).toEqual([false]);
    expect(report.nodes.map((node) => node.outcome)).toEqual([
      { status: "success", desiredEnabled: true },
      { status: "success", desiredEnabled: false },
    ]);
  });

  it("fails over to the next node without touching the unreachable one", async () => {
    const { enforcer } = createEnforcer();
    fake.node(A).reachable = false;

    const report = await enforcer.runCycle();

    expect(report.electedNodeId).toBe("b");
    expect(fake.requestsTo(A).map((request) => request.method)).toEqual(["GET"]);
    expect(fake.node(A).logins).toBe(0);
    expect(fake.mutationsTo(B)).toEqual([true]);
    expect(report.nodes[0]).toEqual({
      nodeId: "a",
      name: "A",
      reachable: false,
      outcome: { status: "skipped", desiredEnabled: false },
    });
  });

  it("mutates nothing and logs in nowhere when every node is down", async () => {
    const { enforcer } = createEnforcer();
    fake.node(A).reachable = false;
    fake.node(B).reachable = false;

    const report = await enforcer.runCycle();

    expect(report.electedNodeId).toBeNull();
    expect(fake.requests.every((request) => request.method === "GET")).toBe(
      true,
    );
    expect(report.nodes.map((node) => node.outcome)).toEqual([
      { status: "skipped", desiredEnabled: false },
      { status: "skipped", desiredEnabled: false },
    ]);
  });

  it("treats a node answering 5xx on the health path as down", async () => {
    const { enforcer } = createEnforcer();
    fake.node(A).probeStatus = 503;

    const report = await enforcer.runCycle();

    expect(report.electedNodeId).toBe("b");
    expect(fake.mutationsTo(A)).toEqual([]);
  });

  it("treats a node answering 4xx on the health path as up", async () => {
    const { enforcer } = createEnforcer();
    fake.node(A).probeStatus = 404;

    const report = await enforcer.runCycle();

    expect(report.electedNodeId).toBe("a");
  });

  it("logs in once per node across consecutive cycles", async () => {
    const { enforcer } = createEnforcer();

    await enforcer.runCycle();
    await enforcer.runCycle();

    expect(fake.node(A).logins).toBe(1);
    expect(fake.node(B).logins).toBe(1);
    expect(fake.mutationsTo(A)).toEqual([true, true]);
    expect(fake.mutationsTo(B)).toEqual([false, false]);
  });

  it("re-authenticates exactly once on the cycle after an authorization failure", async () => {
    const { enforcer } = createEnforcer();
    fake.node(A).mutationResponses = [
      { status: 401, data: { error: { key: "unauthorized" } }, headers: {} },
      { status: 200, data: { success: true }, headers: {} },
    ];

    const first = await enforcer.runCycle();
    expect(first.nodes[0].outcome).toMatchObject({
      status: "error",
      kind: "auth",
    });
    expect(enforcer.listNodes()[0].authenticated).toBe(false);

    fake.requests.length = 0;
    const second = await enforcer.runCycle();

    expect(second.nodes[0].outcome).toEqual({
      status: "success",
      desiredEnabled: true,
    });
    expect(fake.node(A).logins).toBe(2);
    expect(
      fake
        .requestsTo(A)
        .filter((request) => request.method !== "GET")
        .map((request) => `${request.method} ${request.url}`),
    ).toEqual(["POST /api/auth", "PATCH /api/config"]);
    const patch = fake.requestsTo(A, "PATCH")[0];
    expect(patch.headers).toMatchObject({ sid: "sid-2", "X-CSRF-Token": "csrf-2" });
  });

  it("keeps the session after a server error and retries next cycle", async () => {
    const { enforcer } = createEnforcer();
    fake.node(B).mutationResponses = [
      { status: 500, data: "oops", headers: {} },
      { status: 200, data: { success: true }, headers: {} },
    ];

    const first = await enforcer.runCycle();
    const second = await enforcer.runCycle();

    expect(first.nodes[1].outcome).toMatchObject({
      status: "error",
      kind: "transient",
    });
    expect(second.nodes[1].outcome).toEqual({
      status: "success",
      desiredEnabled: false,
    });
    expect(fake.node(B).logins).toBe(1);
  });

  it("isolates one node's failures from the others", async () => {
    const { enforcer } = createEnforcer([
      createTestNode("a", 0),
      createTestNode("b", 1),
      createTestNode("c", 2),
    ]);
    fake.node(B).loginResponses = [{ status: 401, data: {}, headers: {} }];

    const report = await enforcer.runCycle();

    expect(report.nodes.map((node) => node.outcome.status)).toEqual([
      "success",
      "error",
      "success",
    ]);
    expect(fake.mutationsTo(C)).toEqual([false]);
  });

  it("contains unexpected exceptions from a single apply", async () => {
    const { enforcer, mutator } = createEnforcer();
    const apply = mutator.apply.bind(mutator);
    jest.spyOn(mutator, "apply").mockImplementation((state, desired) =>
      state.node.id === "a"
        ? Promise.reject(new Error("exploded"))
        : apply(state, desired),
    );

    const report = await enforcer.runCycle();

    expect(report.nodes[0].outcome).toEqual({
      status: "error",
      desiredEnabled: true,
      kind: "transient",
      message: "exploded",
    });
    expect(report.nodes[1].outcome).toEqual({
      status: "success",
      desiredEnabled: false,
    });
  });

  it("never enables more than one node for any reachability vector", async () => {
    const nodes = [
      createTestNode("a", 0),
      createTestNode("b", 1),
      createTestNode("c", 2),
    ];
    const { enforcer } = createEnforcer(nodes);
    const urls = [A, B, C];

    for (let mask = 0; mask < 8; mask++) {
      urls.forEach((url, index) => {
        fake.node(url).reachable = (mask & (1 << index)) !== 0;
      });
      fake.requests.length = 0;

      const report = await enforcer.runCycle();

      const enabled = urls.flatMap((url) =>
        fake.mutationsTo(url).filter(Boolean),
      );
      expect(enabled.length).toBeLessThanOrEqual(1);

      const expectedLeader = ["a", "b", "c"].find(
        (_, index) => (mask & (1 << index)) !== 0,
      );
      expect(report.electedNodeId).toBe(expectedLeader ?? null);
    }
  });

  it("elects by configured priority, not by list order", async () => {
    const { enforcer } = createEnforcer([
      createTestNode("b", 1),
      createTestNode("a", 0),
    ]);

    const report = await enforcer.runCycle();

    expect(report.electedNodeId).toBe("a");
    expect(report.nodes.map((node) => node.nodeId)).toEqual(["a", "b"]);
  });

  it("hands leadership back when the preferred node returns", async () => {
    const { enforcer } = createEnforcer();
    fake.node(A).reachable = false;
    const down = await enforcer.runCycle();

    fake.node(A).reachable = true;
    const back = await enforcer.runCycle();

    expect(down.electedNodeId).toBe("b");
    expect(back.electedNodeId).toBe("a");
    expect(fake.mutationsTo(B)).toEqual([true, false]);
  });

  it("keeps the last report for the status API", async () => {
    const { enforcer, reporter } = createEnforcer();

    const report = await enforcer.runCycle();

    expect(reporter.getLastReport()).toBe(report);
    expect(reporter.getCompletedCycles()).toBe(1);
    expect(report.cycle).toBe(1);
  });

  it("summarizes nodes without exposing secrets", async () => {
    const { enforcer } = createEnforcer();
    await enforcer.runCycle();

    expect(enforcer.listNodes()).toEqual([
      {
        nodeId: "a",
        name: "A",
        baseUrl: A,
        priority: 0,
        apiGeneration: "v6",
        reachable: true,
        authenticated: true,
      },
      {
        nodeId: "b",
        name: "B",
        baseUrl: B,
        priority: 1,
        apiGeneration: "v6",
        reachable: true,
        authenticated: true,
      },
    ]);
  });

  describe("loop", () => {
    const waitFor = async (condition: () => boolean) => {
      for (let attempt = 0; attempt < 200 && !condition(); attempt++) {
        await new Promise((resolve) => setTimeout(resolve, 5));
      }
    };

    it("stops during the sleep between cycles", async () => {
      const { enforcer } = createEnforcer();
      const cycleSpy = jest.spyOn(enforcer, "runCycle");

      enforcer.start();
      await waitFor(() => cycleSpy.mock.calls.length >= 1 && fake.mutationsTo(B).length === 1);
      await enforcer.stop();

      expect(cycleSpy).toHaveBeenCalledTimes(1);
      expect(enforcer.isRunning()).toBe(false);
    });

    it("keeps running after a cycle throws", async () => {
      const { enforcer } = createEnforcer([createTestNode("a", 0), createTestNode("b", 1)], {
        checkIntervalMs: 1,
      });
      const cycleSpy = jest
        .spyOn(enforcer, "runCycle")
        .mockRejectedValueOnce(new Error("boom"));

      enforcer.start();
      await waitFor(() => cycleSpy.mock.calls.length >= 2);
      await enforcer.stop();

      expect(cycleSpy.mock.calls.length).toBeGreaterThanOrEqual(2);
    });

    it("waits between cycles even when the interval exceeds the timer range", async () => {
      const { enforcer } = createEnforcer(
        [createTestNode("a", 0), createTestNode("b", 1)],
        { checkIntervalMs: 3_000_000_000 },
      );
      const cycleSpy = jest.spyOn(enforcer, "runCycle");

      enforcer.start();
      await waitFor(() => fake.mutationsTo(B).length === 1);
      await new Promise((resolve) => setTimeout(resolve, 50));
      await enforcer.stop();

      expect(cycleSpy).toHaveBeenCalledTimes(1);
    });

    it("ignores a second start while running", async () => {
      const { enforcer } = createEnforcer();
      const cycleSpy = jest.spyOn(enforcer, "runCycle");

      enforcer.start();
      enforcer.start();
      await enforcer.stop();

      expect(cycleSpy).toHaveBeenCalledTimes(1);
    });
  });
});
