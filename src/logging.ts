export const messageList = (names: Iterable<string>): string => Array.from(names).sort().join(', ')

export const formatCallLabel = (call_id: string): string => `call #${call_id.slice(-4)}`

export const formatTraceLine = (call_id: string, text: string): string => `${text} (${formatCallLabel(call_id)})`
