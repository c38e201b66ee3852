export * from "./render.js";
export * from "./savings.js";
export { linesToText, money } from "./lines.js";

export type { ReportLine } from "./lines.js";
