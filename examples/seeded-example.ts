import { SeededRandom, WeightedSampler } from "../src/index";
import { printFrequencyTable, sep } from "./print";

const DRAWS = 20;

function seededExample(seed: string) {
  const random = new SeededRandom(seed);
  const sampler = new WeightedSampler(
    [1, 2, 3, 4, 5, 6],
    [0.1, 0.2, 0.3, 0.2, 0.1, 0.1],
    { random }
  );

  const first = sampler.take(DRAWS);
  random.seed(seed);
  const second = sampler.take(DRAWS);

  sep(`Seed "${seed}"`);
  console.log(`Run 1: ${first.join(" ")}`);
  console.log(`Run 2: ${second.join(" ")}`);
  const same = first.every((value, i) => value === second[i]);
  console.log(same ? "\nSequences match.\n" : "\nSequences differ!\n");

  random.seed(seed);
  printFrequencyTable(sampler, sampler.tally(DRAWS), DRAWS);
}

seededExample(process.argv[3] ?? "10");
