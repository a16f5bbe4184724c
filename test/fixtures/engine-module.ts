import { FakeEngine } from "../helpers/fake-engine.js";

export function createEngine(): FakeEngine {
  return new FakeEngine();
}
