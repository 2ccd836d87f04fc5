/**
 * Splits a command line the way a POSIX shell would for simple cases:
 * whitespace separates words, single quotes are literal, double quotes
 * allow `\"` and `\\`, and a backslash outside quotes escapes the next character.
 * No expansion of any kind is performed.
 */
export function splitCommandLine(input: string): string[] {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let quote: '"' | '\'' | undefined;

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (quote === '\'') {
      if (char === '\'') {
        quote = undefined;
      } else {
        current += char;
      }
      continue;
    }

    if (quote === '"') {
      if (char === '"') {
        quote = undefined;
      } else if (char === '\\' && (input[i + 1] === '"' || input[i + 1] === '\\')) {
        current += input[i + 1];
        i++;
      } else {
        current += char;
      }
      continue;
    }

    if (char === '\'' || char === '"') {
      quote = char;
      inWord = true;
    } else if (char === '\\' && i + 1 < input.length) {
      current += input[i + 1];
      inWord = true;
      i++;
    } else if (/\s/u.test(char)) {
      if (inWord) {
        words.push(current);
        current = '';
        inWord = false;
      }
    } else {
      current += char;
      inWord = true;
    }
  }

  if (quote) {
    throw new Error(`Unterminated ${quote} quote in command line: ${input}`);
  }
  if (inWord) {
    words.push(current);
  }
  return words;
}
