import { describe, it, expect, beforeEach } from "@jest/globals";
import { createApiClient, type ApiClientOptions } from "../../src/client.js";
import { AuthenticationError } from "../../src/errors/index.js";
import { RateLimiter } from "../../src/rate-limit/index.js";
import { FakeGraphQLServer } from "../helpers/fake-graphql-server.js";
import { FakeSocketServer } from "../helpers/fake-socket.js";

const SDL = `
  type Query { me: User }
  type User { id: ID! email: String! }
`;

describe("createApiClient", () => {
  let server: FakeGraphQLServer;
  let sockets: FakeSocketServer;
  let options: ApiClientOptions;

  beforeEach(() => {
    server = new FakeGraphQLServer({
      sdl: SDL,
      rootValue: { me: () => ({ id: "user-1", email: "user@example.test" }) },
    });
    sockets = new FakeSocketServer();
    options = {
      endpoint: "http://localhost:4000/api/label/v2/graphql",
      apiKey: "test-secret",
      fetch: server.fetch,
      rateLimiter: new RateLimiter({ maxCalls: 10, windowMs: 1000, maxWaitMs: 1000 }),
      enableSchemaCaching: false,
      subscription: { socketFactory: sockets.factory },
    };
  });

  it("acquires the schema before resolving", async () => {
    const client = await createApiClient(options);

    expect(client.queries.getSchemaHandle()?.cachePath).toBeNull();
    expect(server.introspectionCount()).toBe(1);
    expect(sockets.sockets).toHaveLength(0);
  });

  it("checkApiKey returns the user owning the key", async () => {
    const client = await createApiClient(options);

    await expect(client.checkApiKey()).resolves.toEqual({ id: "user-1", email: "user@example.test" });
  });

  it("checkApiKey rejects a key without a user", async () => {
    server.rootValue = { me: () => null };
    const client = await createApiClient(options);

    await expect(client.checkApiKey()).rejects.toBeInstanceOf(AuthenticationError);
  });

  it("opens the subscription socket on first use and closes it", async () => {
    const client = await createApiClient(options);

    const handle = await client.subscribe("subscription { me { id } }", undefined, () => undefined);

    expect(sockets.sockets).toHaveLength(1);
    expect(sockets.latest().url).toBe("ws://localhost:4000/api/label/v2/graphql");

    client.close();
    expect(handle.isRunning()).toBe(false);
    expect(sockets.latest().closed).toBe(true);
  });
});
