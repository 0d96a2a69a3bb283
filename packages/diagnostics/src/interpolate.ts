import type { DiagnosticArgs } from './types.ts'

/**
 * Fill `{key}` placeholders from args. Unknown keys are left in place.
 */
export function interpolateMessage(template: string, args?: DiagnosticArgs): string {
	if (!args) return template
	return template.replace(/\{(\w+)\}/g, (placeholder, key: string) => {
		const value = args[key]
		return value === undefined ? placeholder : String(value)
	})
}
