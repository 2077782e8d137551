import fs from "node:fs";
import path from "node:path";

interface YamlLine {
  indent: number;
  text: string;
  lineNo: number;
}

/**
 * Block mappings and sequences of scalars or mappings, plus flow sequences of
 * scalars (`[a, b]`). Anchors, multi-line strings and flow mappings other than
 * `{}` are rejected or read as plain text.
 */
class ProfileYamlParser {
  private idx = 0;

  constructor(
    private readonly lines: readonly YamlLine[],
    private readonly absPath: string
  ) {}

  parse(): unknown {
    const first = this.peek();
    if (!first) {
      return {};
    }

    const value = this.parseNode(first.indent);
    const rest = this.peek();
    if (rest) {
      throw this.error(rest.lineNo, `unexpected content '${rest.text}'`);
    }
    return value;
  }

  private parseNode(indent: number): unknown {
    const current = this.peek();
    if (!current) {
      throw new Error(`${this.absPath}: unexpected EOF`);
    }
    if (current.indent !== indent) {
      throw this.error(current.lineNo, `invalid indentation for '${current.text}'`);
    }
    return current.text.startsWith("- ") || current.text === "-"
      ? this.parseSequence(indent)
      : this.parseMapping(indent, {});
  }

  private parseMapping(indent: number, out: Record<string, unknown>): Record<string, unknown> {
    for (let line = this.peek(); line && line.indent >= indent; line = this.peek()) {
      if (line.indent > indent) {
        throw this.error(line.lineNo, `invalid indentation for '${line.text}'`);
      }
      if (line.text.startsWith("- ")) {
        break;
      }

      const { key, rest } = this.splitKeyValue(line.text, line.lineNo);
      if (Object.hasOwn(out, key)) {
        throw this.error(line.lineNo, `duplicate key '${key}'`);
      }
      this.idx += 1;
      out[key] = rest === "" ? this.parseNested(indent) : this.parseScalar(rest, line.lineNo);
    }
    return out;
  }

  private parseSequence(indent: number): unknown[] {
    const out: unknown[] = [];

    for (let line = this.peek(); line && line.indent >= indent; line = this.peek()) {
      if (line.indent > indent) {
        throw this.error(line.lineNo, `invalid indentation for '${line.text}'`);
      }
      if (!line.text.startsWith("- ") && line.text !== "-") {
        break;
      }

      const rest = line.text.slice(1).trim();
      const lineNo = line.lineNo;
      this.idx += 1;

      if (rest === "") {
        out.push(this.parseNested(indent, null));
      } else if (this.looksLikeKeyValue(rest)) {
        // "- key: value" opens a mapping whose further keys sit two columns in.
        const { key, rest: inlineRest } = this.splitKeyValue(rest, lineNo);
        const item: Record<string, unknown> = {
          [key]:
            inlineRest === ""
              ? this.parseNested(indent + 2)
              : this.parseScalar(inlineRest, lineNo),
        };
        const next = this.peek();
        if (next && next.indent > indent) {
          if (next.indent !== indent + 2) {
            throw this.error(next.lineNo, `invalid indentation for '${next.text}'`);
          }
          this.parseMapping(indent + 2, item);
        }
        out.push(item);
      } else {
        out.push(this.parseScalar(rest, lineNo));
      }
    }
    return out;
  }

  private parseNested(indent: number, empty: unknown = {}): unknown {
    const nested = this.peek();
    return nested && nested.indent > indent ? this.parseNode(nested.indent) : empty;
  }

  private looksLikeKeyValue(value: string): boolean {
    if (value.startsWith('"') || value.startsWith("'") || value.startsWith("[")) {
      return false;
    }
    return /^[^:\s][^:]*:(\s|$)/.test(value);
  }

  private splitKeyValue(value: string, lineNo: number): { key: string; rest: string } {
    const idx = value.indexOf(":");
    if (idx <= 0) {
      throw this.error(lineNo, "expected 'key: value'");
    }
    const key = value.slice(0, idx).trim();
    if (key === "") {
      throw this.error(lineNo, "empty key is not allowed");
    }
    return { key, rest: value.slice(idx + 1).trim() };
  }

  private parseScalar(value: string, lineNo: number): unknown {
    const trimmed = value.trim();

    if (trimmed === "{}") {
      return {};
    }
    if (trimmed.startsWith("[") && trimmed.endsWith("]")) {
      const inner = trimmed.slice(1, -1).trim();
      return inner === ""
        ? []
        : inner.split(",").map((item) => this.parseScalar(item, lineNo));
    }
    if (
      trimmed.length >= 2 &&
      ((trimmed.startsWith('"') && trimmed.endsWith('"')) ||
        (trimmed.startsWith("'") && trimmed.endsWith("'")))
    ) {
      return trimmed.slice(1, -1);
    }
    if (trimmed === "true" || trimmed === "false") {
      return trimmed === "true";
    }
    if (trimmed === "null" || trimmed === "~") {
      return null;
    }
    if (/^-?\d+(?:\.\d+)?$/.test(trimmed)) {
      return Number(trimmed);
    }
    if (trimmed === "") {
      throw this.error(lineNo, "empty scalar is not allowed");
    }
    return trimmed;
  }

  private peek(): YamlLine | undefined {
    return this.lines[this.idx];
  }

  private error(lineNo: number, message: string): Error {
    return new Error(`${this.absPath}:${lineNo} ${message}`);
  }
}

function toYamlLines(raw: string, absPath: string): YamlLine[] {
  const source = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
  const out: YamlLine[] = [];

  source.split(/\r?\n/).forEach((line, i) => {
    const lineNo = i + 1;
    if (line.includes("\t")) {
      throw new Error(`${absPath}:${lineNo} tab indentation is not supported`);
    }

    const noComment = line.replace(/\s+#.*$/, "");
    const trimmed = noComment.trim();
    if (trimmed === "" || trimmed.startsWith("#") || trimmed === "---") {
      return;
    }

    const indent = noComment.length - noComment.trimStart().length;
    out.push({ indent, text: trimmed, lineNo });
  });

  return out;
}

export function parseYaml(raw: string, sourceName: string): unknown {
  return new ProfileYamlParser(toYamlLines(raw, sourceName), sourceName).parse();
}

export function loadYamlFile(absPath: string): unknown {
  if (!path.isAbsolute(absPath)) {
    throw new Error(`PROFILE_LOAD_ERROR ${absPath}: path must be absolute`);
  }
  if (!fs.existsSync(absPath) || !fs.statSync(absPath).isFile()) {
    throw new Error(`PROFILE_LOAD_ERROR ${absPath}: file does not exist`);
  }

  try {
    return parseYaml(fs.readFileSync(absPath, "utf8"), absPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`PROFILE_LOAD_ERROR ${absPath}: ${message}`, { cause: error });
  }
}
