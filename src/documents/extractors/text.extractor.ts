export async function extractPlainText(buffer: Buffer): Promise<string> {
  const text = buffer.toString("utf-8");
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}
