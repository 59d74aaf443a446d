// src/views/Layout.tsx
import type { ReactNode } from "react";

const STYLES = `
body { font-family: system-ui, sans-serif; max-width: 52rem; margin: 2rem auto; padding: 0 1rem; color: #1d1d1f; line-height: 1.5; }
form label { display: block; margin-top: 1rem; font-weight: 600; }
form input[type=text], form textarea { width: 100%; padding: .4rem; font: inherit; }
button, .button { margin-top: 1.2rem; padding: .5rem 1.2rem; font: inherit; cursor: pointer; }
.error { background: #fdecea; border: 1px solid #f5c2c0; color: #8a1c14; padding: .6rem .8rem; border-radius: 4px; }
.meta { color: #555; }
.section { border-top: 1px solid #ddd; padding-top: .4rem; }
.section h4 { margin-bottom: .2rem; }
`;

export function Layout({ title, children }: { title: string; children: ReactNode }) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{title}</title>
        <style dangerouslySetInnerHTML={{ __html: STYLES }} />
      </head>
      <body>{children}</body>
    </html>
  );
}
