/**
 * Word-wraps text to a maximum line length. Words are never split; a
 * word longer than the width sits on its own line.
 */
export function wrapText(text: string, width: number): string[] {
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  const lines: string[] = [];
  let currentLine = "";

  words.forEach((word) => {
    if (!currentLine) {
      currentLine = word;
    } else if (currentLine.length + word.length + 1 > width) {
      lines.push(currentLine);
      currentLine = word;
    } else {
      currentLine += " " + word;
    }
  });

  if (currentLine) {
    lines.push(currentLine);
  }

  return lines;
}
