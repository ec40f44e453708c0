/**
 * Log level enumerations for the AI core.
 *
 * @module shared/constants/LogEnums
 */

/**
 * Enumeration of log levels, lowest severity first.
 */
export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

/**
 * Enumeration of log categories for identifying which subsystem generated
 * the log.
 */
export enum LogCategory {
  /** Goal planning and the orchestrator */
  AI = "ai",
  /** Cost maps, A* and flood fills */
  NAVIGATION = "navigation",
  /** Field of view and visible entity lists */
  PERCEPTION = "perception",
  /** Configuration loading and DI wiring */
  CONFIG = "config",
  /** General/uncategorized logs */
  GENERAL = "general",
}
