export { compareLifetimes, validateLifetimes, type LifetimeReport, type LifetimeViolation } from "./validator.js";
