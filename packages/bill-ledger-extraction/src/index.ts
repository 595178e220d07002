export * from "./processor/bill-assembler.js";
export * from "./processor/bill-parser.js";
export * from "./processor/bill-processor.js";
export * from "./processor/categorizer.js";
export * from "./processor/csv-normalizer.js";
export * from "./processor/csv-table.js";
export * from "./processor/extraction-profiles.js";
export * from "./processor/field-extractors.js";
export * from "./processor/image-preprocessor.js";
export * from "./processor/line-item-extractor.js";
export * from "./processor/normalization.js";
export * from "./processor/types.js";
export * from "./processor/vision-recognizer.js";
