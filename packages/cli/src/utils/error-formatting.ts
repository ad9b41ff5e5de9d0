/**
 * Error formatting utilities for consistent CLI error messages
 */

/**
 * Format an error message with optional suggestions
 */
export function formatError(message: string, suggestions?: string[]): void {
  console.error(`❌ ${message}`);
  if (suggestions && suggestions.length > 0) {
    console.error('');
    suggestions.forEach((suggestion) => {
      console.error(`💡 ${suggestion}`);
    });
  }
}
