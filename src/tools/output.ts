/** Cap a tool result so one large document read cannot crowd out the conversation. */
export function truncateToolOutput(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return (
    text.slice(0, maxChars) +
    `\n\n[OUTPUT TRUNCATED: showing ${maxChars} of ${text.length} characters. ` +
    'Narrow the request (page range, row range or a search) to see the rest.]'
  );
}

/** Pretty JSON for structured tool results. */
export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
