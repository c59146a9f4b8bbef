export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
}

export function formatXml(tag: string, attrs: Record<string, string | number | boolean | null>, body?: string): string {
  const attrStr = Object.entries(attrs)
    .filter(([, v]) => v !== null)
    .map(([k, v]) => `${k}="${escapeXml(String(v))}"`)
    .join(' ')
  const open = attrStr ? `<${tag} ${attrStr}` : `<${tag}`
  if (body === undefined) return `${open} />`
  return `${open}>\n${body}\n</${tag}>`
}
