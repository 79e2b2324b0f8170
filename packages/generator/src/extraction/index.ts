export { extractDescriptors, type ExtractionResult } from "./extractor.js";
export { extractClass, extractInterface, type DeclarationContext, type ExtractedDeclaration } from "./class-extractor.js";
export { MARKERS } from "./markers.js";
