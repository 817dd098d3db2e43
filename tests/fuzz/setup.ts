/**
 * Vitest setup file for property tests.
 * Applies fast-check global defaults from the environment.
 */
import * as fc from 'fast-check'

// FUZZ_ITERATIONS: runs per property (default 50; use 1000+ for deep runs)
const fuzzIterations = process.env.FUZZ_ITERATIONS ?? ''
const parsed = fuzzIterations ? parseInt(fuzzIterations, 10) : NaN
const numRuns = isNaN(parsed) ? 50 : parsed

const fuzzVerbose = (process.env.FUZZ_VERBOSE ?? 'false') === 'true'

fc.configureGlobal({
  numRuns,
  // Prints the seed and counterexample path on failure
  verbose: fuzzVerbose,
})

if (fuzzVerbose) {
  console.log(`\nfast-check: ${numRuns} runs per property`)
}
