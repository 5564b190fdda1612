/** Ordered danger categories for a shell command. */
export type CommandRiskLevel = 'safe' | 'read' | 'write' | 'destructive' | 'privileged';

export const COMMAND_RISK_LEVELS: readonly CommandRiskLevel[] = ['safe', 'read', 'write', 'destructive', 'privileged'];

export interface CommandValidation {
    isValid: boolean;
    issues: string[];
    /** Shell control operators are flagged, not rejected. */
    hasShellOperators: boolean;
    riskLevel: CommandRiskLevel;
}

export const SHELL_CONNECTOR_ID = 'shell';
export const SHELL_CONNECTOR_NAME = 'System Commands';
export const SHELL_TOOL_NAME = 'execute';
