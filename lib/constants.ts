/**
 * Constants shared across the gridwriter modules.
 */

/** Package name used as the log prefix and service name */
export const PACKAGE_NAME = "gridwriter";

/** Environment variables read at module load */
export const ENV_VARS = {
	DEBUG: "GRIDWRITER_DEBUG",
	LOG_LEVEL: "GRIDWRITER_LOG_LEVEL",
	CONSOLE_LOG: "GRIDWRITER_CONSOLE_LOG",
} as const;
