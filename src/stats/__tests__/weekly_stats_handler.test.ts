import { handler } from "../../../functions/nodejs/weekly_stats";
import { DispatchError } from "@src/stats/domain/errors";
import { parseEnvelope } from "@src/stats/domain/envelope";

jest.mock("@src/stats/infrastructure/aws_collaborators", () => {
  const collaborators = {
    parameters: { get: jest.fn() },
    snapshots: { fetch: jest.fn() },
    engine: { open: jest.fn() },
    invoker: { invoke: jest.fn() },
  };
  return { createAwsCollaborators: () => collaborators, collaborators };
});

interface MockedCollaborators {
  parameters: { get: jest.Mock };
  snapshots: { fetch: jest.Mock };
  engine: { open: jest.Mock };
  invoker: { invoke: jest.Mock };
}

const { collaborators } = jest.requireMock<{ collaborators: MockedCollaborators }>(
  "@src/stats/infrastructure/aws_collaborators"
);

const scheduledEvent = {
  id: "cdc73f9d-aea9-11e3-9d5a-835b769c0d9c",
  "detail-type": "Scheduled Event",
  source: "aws.events",
  time: "2026-10-17T13:00:00Z",
  detail: {},
};

describe("weekly stats handler", () => {
  beforeEach(() => {
    jest.resetAllMocks();
    collaborators.parameters.get.mockResolvedValue("notify");
    collaborators.snapshots.fetch.mockResolvedValue(undefined);
    collaborators.engine.open.mockResolvedValue({
      query: async () => ({ columns: ["n"], rows: [[1]] }),
      close: async () => {},
    });
    collaborators.invoker.invoke.mockResolvedValue(undefined);
  });

  test("rejects events without an id", async () => {
    await expect(handler({ source: "aws.events" })).rejects.toThrow(
      "Invalid trigger event: id: Required"
    );
    expect(collaborators.parameters.get).not.toHaveBeenCalled();
  });

  test("runs the pipeline and reports success", async () => {
    const response = await handler(scheduledEvent, { awsRequestId: "req-1" });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toEqual({
      status: "ok",
      result: {
        correlationId: "cdc73f9d-aea9-11e3-9d5a-835b769c0d9c",
        title: "Weekly activity stats",
        failedQueries: [],
      },
    });
    expect(collaborators.parameters.get).toHaveBeenCalledWith(
      "/stats/dispatch-target",
      true
    );
    expect(collaborators.invoker.invoke).toHaveBeenCalledTimes(1);
    const [target, payload] = collaborators.invoker.invoke.mock.calls[0];
    expect(target).toBe("notify");
    expect(parseEnvelope(payload).Event.Description).toContain(
      "The community has built a ton of things!\n```\n+---+\n| N |\n"
    );
  });

  test("a failed run fails the invocation", async () => {
    collaborators.invoker.invoke.mockRejectedValue(new Error("Rate exceeded"));
    await expect(handler(scheduledEvent)).rejects.toBeInstanceOf(DispatchError);
  });
});
