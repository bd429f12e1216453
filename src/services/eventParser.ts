import type { EventTextParser, ParsedEvent } from "./types";

// [event start="2026-05-01 18:00" end="..." name="..." status="private" allowed-groups="a,b"]
const EVENT_TAG = /\[event\b([^\]]*)\]/i;
const ATTRIBUTE = /([a-zA-Z][\w-]*)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'\]]+))/g;

const KNOWN_ATTRIBUTES: Record<string, keyof ParsedEvent> = {
  name: "name",
  start: "start",
  end: "end",
  status: "status",
  "allowed-groups": "allowedGroups",
  allowedgroups: "allowedGroups",
};

export function parseEventAttributes(source: string): ParsedEvent {
  const out: ParsedEvent = {};

  for (const match of source.matchAll(ATTRIBUTE)) {
    const key = KNOWN_ATTRIBUTES[match[1].toLowerCase()];
    if (!key) continue;
    out[key] = match[2] ?? match[3] ?? match[4] ?? "";
  }

  return out;
}

/**
 * Reads the first [event] tag of a post. Later tags are ignored.
 */
export function createEventParser(): EventTextParser {
  return {
    extract(raw: string) {
      const match = EVENT_TAG.exec(raw);
      if (!match) return null;
      return parseEventAttributes(match[1]);
    },
  };
}
