import { WeightedSampler } from "../src/index";
import { printFrequencyChart, printFrequencyTable, printSummary } from "./print";

// More draws bring the counts closer to the target probabilities.
const ITERATIONS = 10000;

function basicSamplingExample() {
  const sampler = new WeightedSampler(
    [-1, 0, 1, 2, 3],
    [0.01, 0.3, 0.58, 0.1, 0.01]
  );
  const counts = sampler.tally(ITERATIONS);

  printSummary(sampler);
  printFrequencyTable(sampler, counts, ITERATIONS);
  printFrequencyChart(counts, ITERATIONS);
}

basicSamplingExample();
