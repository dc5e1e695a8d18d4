// pattern: Factory

/**
 * Standard help text patterns for command definitions
 */
export const HelpTextPatterns = {
  /**
   * Creates standard "Examples:" section for help text
   */
  examples: (examples: string[]): string => `
Examples:
${examples.map(ex => `  ${ex}`).join("\n")}
      `,

  /**
   * Creates standard before-help text with description and details
   */
  beforeHelp: (description: string, details?: string[]): string => {
    let text = `\n${description}\n`;
    if (details) {
      text += `\n${details.join("\n")}\n`;
    }
    return `${text}      `;
  },
};
