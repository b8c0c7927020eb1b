function parseObject(text: string): object | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Pulls the first JSON object out of an LLM response that may be wrapped in
 * markdown fences or surrounded by prose. Returns null when nothing parses.
 */
export function extractJsonObject(response: string): unknown {
  let jsonString = response.trim();
  jsonString = jsonString.replace(/```json\s*/gi, '');
  jsonString = jsonString.replace(/```\s*/g, '');

  const direct = parseObject(jsonString);
  if (direct) return direct;

  const jsonMatch = jsonString.match(/\{[\s\S]*\}/);
  if (!jsonMatch) return null;

  return parseObject(jsonMatch[0]);
}
