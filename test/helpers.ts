/**
 * Shared fixtures for kernel and replay tests
 */

import { MarketSimulation } from "../src/lib/simulation";
import type { SimulationConfigInput } from "../src/lib/config";
import type { Side } from "../src/lib/engine-common";

/**
 * Three agents drawing from their own streams, with jittered latency and
 * random queue tie-breaks.
 */
export function randomRun(seed: number, extra: Omit<SimulationConfigInput, "seed"> = {}): MarketSimulation {
  const sim = new MarketSimulation({
    seed,
    accounts: [
      { owner: "alice", cash: 10000, inventory: 50 },
      { owner: "bob", cash: 10000, inventory: 50 },
    ],
    latency: { submissionDelay: 2, fillDelay: 1, jitter: 3 },
    tieBreak: "RANDOM",
    ...extra,
  });
  const agents = ["alice", "bob", "carol"];

  for (let i = 0; i < 60; i++) {
    const owner = sim.stream("agents.flow").randomChoice(agents);
    const rng = sim.stream(`agents.${owner}`);
    const side: Side = rng.random() < 0.5 ? "BUY" : "SELL";
    const response = sim.submit({
      owner,
      side,
      price: rng.randomRange(95, 105),
      quantity: rng.randomRange(1, 10),
    });
    if (response.accepted && rng.random() < 0.2) {
      sim.cancel(response.orderId, owner);
    }
    sim.run({ maxEvents: 3 });
  }
  sim.run();
  return sim;
}
