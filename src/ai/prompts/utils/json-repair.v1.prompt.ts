export const JSON_REPAIR_V1_PROMPT = `Repair malformed JSON produced by an earlier step.

Input:
- schema_hint: plain text description of the expected object.
- raw: the malformed JSON-like text.

Rules:
- Return one valid JSON object and nothing else.
- Keep keys and values as close to raw as possible.
- Unknown fields become null, an empty array or an empty object.
- No markdown fences, no commentary.`;

export function buildJsonRepairV1Prompt(input: {
  schemaHint: string;
  raw: string;
}): string {
  return [
    JSON_REPAIR_V1_PROMPT,
    "",
    "Input JSON:",
    JSON.stringify(
      {
        schema_hint: input.schemaHint,
        raw: input.raw,
      },
      null,
      2,
    ),
  ].join("\n");
}
