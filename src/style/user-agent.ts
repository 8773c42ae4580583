// Built-in default stylesheet, tuned for a character grid: vertical margins
// are whole rows, indentation is in columns, and the body has no margin.

import { parseStylesheet, type StyleRule } from '../css/parser.js';

export const USER_AGENT_CSS = `
html, address, article, aside, blockquote, body, center, dd, details, dialog,
dir, div, dl, dt, fieldset, figcaption, figure, footer, form, h1, h2, h3, h4,
h5, h6, header, hgroup, hr, legend, listing, main, menu, nav, ol, p,
plaintext, pre, section, summary, ul, xmp, caption, noscript {
  display: block;
}

head, script, style, title, meta, link, base, template, area, datalist, param,
source, track, map, [hidden], input[type=hidden], option, optgroup {
  display: none;
}

li { display: list-item; }
table { display: table; }
tr { display: table-row; }
thead, tbody, tfoot { display: table-row-group; }
td, th { display: table-cell; }

body { margin: 0; }

p, blockquote, dl, ul, ol, menu, dir, pre, xmp, listing, plaintext, figure,
h1, h2, h3, h4, h5, h6, table, fieldset, hr {
  margin-top: 1lh;
  margin-bottom: 1lh;
}

li ul, li ol, li menu, ul ul, ul ol, ol ul, ol ol { margin-top: 0; margin-bottom: 0; }

h1, h2, h3, h4, h5, h6, b, strong, th, dt, legend, summary { font-weight: bold; }
h1 { text-transform: uppercase; }

i, em, cite, var, dfn, address { font-style: italic; }
u, ins, a:link { text-decoration: underline; }
s, strike, del { text-decoration: line-through; }

pre, xmp, listing, plaintext, textarea { white-space: pre; }
nobr { white-space: nowrap; }

ul, menu, dir { list-style-type: disc; padding-left: 4ch; }
ol { list-style-type: decimal; padding-left: 4ch; }
ul ul, ol ul, menu ul { list-style-type: circle; }
ul ul ul, ol ol ul, ol ul ul, ul ol ul { list-style-type: square; }

blockquote, figure { margin-left: 4ch; margin-right: 4ch; }
dd { margin-left: 4ch; }
center, caption { text-align: center; }

hr { border-top-style: solid; }
fieldset { border: solid; padding-left: 1ch; padding-right: 1ch; }
`;

let cachedRules: readonly StyleRule[] | null = null;

/**
 * The parsed user-agent rules. Parsed once; the list and its rules are frozen.
 */
export function userAgentRules(): readonly StyleRule[] {
  if (cachedRules === null) {
    const rules = parseStylesheet(USER_AGENT_CSS, { origin: 'user-agent' });
    for (const rule of rules) Object.freeze(rule);
    cachedRules = Object.freeze(rules);
  }
  return cachedRules;
}
