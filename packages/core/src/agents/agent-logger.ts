/**
 * Optional logger callback for agent messages.
 * @param message - The message to log
 * @param onlyVerbose - If true, message should only be logged in verbose mode
 */
export type AgentLogger = (message: string, onlyVerbose?: boolean) => void;
