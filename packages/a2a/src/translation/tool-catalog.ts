import type { ToolDescriptor } from '../messages/types.js';

export const TOOL_CATALOG_OPEN = '<available_tools>';
export const TOOL_CATALOG_CLOSE = '</available_tools>';

/**
 * Instruction appended after the catalog telling the agent how to request a tool call
 */
export const TOOL_CALL_INSTRUCTION =
    'To use a tool, respond with JSON: {"tool_call": {"name": "tool_name", "arguments": {"param1": "value"}}}';

/**
 * Render a tool catalog as a text block the remote agent can read.
 *
 * Each tool gets a call signature, its description and one line per parameter:
 *
 * ```text
 * <available_tools>
 * - get_order(order_id: string)
 *   Description: Look up an order
 *   Parameters:
 *     - order_id (string, required): Order identifier
 *
 * </available_tools>
 *
 * To use a tool, respond with JSON: {"tool_call": ...}
 * ```
 *
 * An empty catalog renders as the empty string.
 */
export function formatToolsAsText(tools: readonly ToolDescriptor[]): string {
    if (tools.length === 0) {
        return '';
    }

    const lines: string[] = [TOOL_CATALOG_OPEN];

    for (const tool of tools) {
        const properties = Object.entries(tool.parameters?.properties ?? {});
        const required = new Set(tool.parameters?.required ?? []);

        const signature = properties
            .map(([paramName, schema]) => `${paramName}: ${schema.type ?? 'any'}`)
            .join(', ');
        lines.push(`- ${tool.name}(${signature})`);
        lines.push(`  Description: ${tool.description || 'No description available'}`);

        if (properties.length > 0) {
            lines.push('  Parameters:');
            for (const [paramName, schema] of properties) {
                const requirement = required.has(paramName) ? 'required' : 'optional';
                lines.push(
                    `    - ${paramName} (${schema.type ?? 'any'}, ${requirement}): ${schema.description || 'No description'}`
                );
            }
        }

        lines.push('');
    }

    lines.push(TOOL_CATALOG_CLOSE, '', TOOL_CALL_INSTRUCTION);
    return lines.join('\n');
}
