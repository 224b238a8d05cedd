import { EnvironmentDiscoveryError, isStashlinkError } from "@stashlink/core";

const CODE_LABELS = {
    not_found: "Not found",
    environment: "Environment not found",
    io: "Filesystem error",
    invalid_input: "Invalid input",
    integrity: "Integrity check failed",
} as const;

/**
 * Lines to print for a failed command, with a remediation hint where there is one
 */
export function formatError(error: unknown): string[] {
    if (error instanceof EnvironmentDiscoveryError) {
        return [
            `${CODE_LABELS.environment} (${error.language}): ${error.message}`,
            `  Hint: ${error.hint}`,
        ];
    }
    if (isStashlinkError(error)) {
        return [`${CODE_LABELS[error.code]}: ${error.message}`];
    }
    if (error instanceof Error) {
        return [`Error: ${error.message}`];
    }
    return ["An unknown error occurred"];
}
