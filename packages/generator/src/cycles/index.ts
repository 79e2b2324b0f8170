export { detectCycles, type CyclePath, type CycleReport } from "./detector.js";
