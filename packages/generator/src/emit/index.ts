export { emitConstructor, emitConstructors, type ConstructorArtifact, type ConstructorReport } from "./constructor.js";
export { injectConstructors } from "./inject.js";
export {
  emitRegistrationModule,
  moduleSpecifier,
  renderCondition,
  type RegistrationArtifact,
} from "./registration.js";
export { applyEdits, insert, type SourceEdit } from "./edit.js";
export { escapeString, quote } from "./format.js";
