import { TokenizerOptions } from "../config/IndexerConfig";
import { EncodingError, ErrorContext } from "../errors/IndexerErrors";

const WHITESPACE = /\s+/;
//anything that is not a letter, a digit or whitespace
const PUNCTUATION = /[^\p{L}\p{N}\s]/gu;
//C0 controls other than tab, line feed and carriage return
const CONTROL_CHARACTER = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/;
const UNPAIRED_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;
const REPLACEMENT_CHARACTER = "\uFFFD";

export function normalizeLine(line: string, options: TokenizerOptions): string
{
    let normalized = options.caseSensitive ? line : line.toLowerCase();
    if (options.stripPunctuation) normalized = normalized.replace(PUNCTUATION, " ");
    return normalized;
}

//returns why the line cannot be tokenized, or undefined when it can
export function findEncodingIssue(line: string): string | undefined
{
    if (line.includes(REPLACEMENT_CHARACTER)) return "line contains undecodable bytes";
    if (CONTROL_CHARACTER.test(line)) return "line contains a control character";
    if (UNPAIRED_SURROGATE.test(line)) return "line contains an unpaired surrogate";
    return undefined;
}

//context (usually chapter and line) is attached to the EncodingError thrown for a bad line
export function tokenizeLine(line: string, options: TokenizerOptions, context: ErrorContext = {}): string[]
{
    const issue = findEncodingIssue(line);
    if (issue) throw new EncodingError(issue, context);

    return normalizeLine(line, options)
        .split(WHITESPACE)
        .filter(token => token.length > 0);
}

export function splitLines(text: string): string[]
{
    if (text.length === 0) return [];
    const body = text.charCodeAt(0) === 0xFEFF ? text.slice(1) : text;
    const lines = body.split(/\r?\n/);
    //a trailing newline terminates the last line, it does not start a new one
    if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
    return lines;
}
