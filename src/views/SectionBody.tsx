// src/views/SectionBody.tsx
import type { FormattedBlock } from "../services/format";

type Group =
  | { kind: "list"; items: string[] }
  | { kind: "subheading" | "paragraph"; text: string };

function groupItems(blocks: FormattedBlock[]): Group[] {
  const groups: Group[] = [];
  for (const block of blocks) {
    const last = groups[groups.length - 1];
    if (block.kind === "item") {
      if (last && last.kind === "list") last.items.push(block.text);
      else groups.push({ kind: "list", items: [block.text] });
    } else {
      groups.push({ kind: block.kind, text: block.text });
    }
  }
  return groups;
}

/** Consecutive list items share one <ul>; everything else renders on its own. */
export function SectionBody({ blocks }: { blocks: FormattedBlock[] }) {
  return (
    <>
      {groupItems(blocks).map((group, i) => {
        if (group.kind === "list") {
          return (
            <ul key={i}>
              {group.items.map((item, j) => (
                <li key={j}>{item}</li>
              ))}
            </ul>
          );
        }
        if (group.kind === "subheading") return <h4 key={i}>{group.text}</h4>;
        return <p key={i}>{group.text}</p>;
      })}
    </>
  );
}
