export { createConsoleReporter, type Reporter, type ReporterStreams } from "./reporter.js";

export { directorySize, formatSize } from "./size.js";
