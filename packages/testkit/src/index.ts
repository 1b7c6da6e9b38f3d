export { seededRandom, randomListings, type RandomListingOptions } from "./random.js";
export { ScriptedPrompter, CapturedOutput } from "./cli.js";
