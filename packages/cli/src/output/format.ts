const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const CYAN = "\x1b[36m";

const CATEGORY_PALETTE = [
  "\x1b[32m", // green
  "\x1b[34m", // blue
  "\x1b[35m", // magenta
  "\x1b[33m", // yellow
  "\x1b[92m", // bright green
  "\x1b[94m", // bright blue
  "\x1b[95m", // bright magenta
];

const STDERR_COLOR = "\x1b[31m";

export type CategoryFormatter = (category: string, text: string) => string;

function paint(useColor: boolean, code: string, text: string): string {
  return useColor ? `${code}${text}${RESET}` : text;
}

/** Prefixes lines with `[category]`, giving each category a stable color. */
export function createCategoryFormatter(useColor: boolean): CategoryFormatter {
  const colors = new Map<string, string>();
  let colorIdx = 0;

  function categoryColor(category: string): string {
    if (category === "stderr") return STDERR_COLOR;
    let c = colors.get(category);
    if (!c) {
      c = CATEGORY_PALETTE[colorIdx % CATEGORY_PALETTE.length];
      colorIdx++;
      colors.set(category, c);
    }
    return c;
  }

  return (category, text) => `${paint(useColor, categoryColor(category), `[${category}]`)} ${text}`;
}

export function formatStatus(message: string, useColor: boolean): string {
  return `${paint(useColor, CYAN + BOLD, "[linetap]")} ${message}`;
}
