/** Extracts one field value from a status query's text output. */
export type FieldParser = (output: string) => string | undefined;

/**
 * Line-scan parser: on the first line that starts with exactly `key:`, returns
 * the trimmed text up to the next colon ("state: 5:x" reads as "5").
 * Indented (nested) fields never match.
 */
export function lineFieldParser(key: string): FieldParser {
  const prefix = `${key}:`;
  return (output) => {
    for (const line of output.split(/\r?\n/)) {
      if (line.startsWith(prefix)) {
        return line.slice(prefix.length).split(":")[0]?.trim() ?? "";
      }
    }
    return undefined;
  };
}
