import { Agent, MockAgent, setGlobalDispatcher } from "undici";
import { afterAll, beforeAll } from "vitest";

let restoreDispatcher: Agent | undefined;

beforeAll(() => {
  const mock = new MockAgent();
  mock.disableNetConnect();
  restoreDispatcher = new Agent();
  setGlobalDispatcher(mock);
});

afterAll(() => {
  if (restoreDispatcher) {
    setGlobalDispatcher(restoreDispatcher);
  }
});
