/**
 * Page templates for the rnode web UI
 *
 * The diagnostics page is a fixed template with three insertion points,
 * filled in order: the peer list, the last submitted code, the last store
 * contents. Code and store contents are inserted as-is.
 */

export const PART = '<!-- PART -->';

export const PAGE_TEMPLATE = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>rnode diagnostics</title>
  <style>
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', sans-serif; margin: 24px; }
    textarea, pre { font-family: monospace; }
    pre#store { background: #f4f4f4; padding: 8px; white-space: pre-wrap; }
  </style>
</head>
<body>
  <h1>rnode</h1>
  <address>
    <b>pre-release</b> for the
    <a href="https://developer.rchain.coop/">RChain Developer</a>
    community
  </address>

  <h2>Peers</h2>
  <ul>
${PART}
  </ul>

  <h2>Rholang and RSpace</h2>
  <form action="" method="post">
    <textarea name="rho1" cols="40" rows="10">${PART}</textarea>
    <br />
    <input type="submit" value="Run" />
  </form>

  <pre id="store">
${PART}
  </pre>
</body>
</html>
`;

export interface PageContent {
  peers: string[];
  code: string;
  storeContents: string;
}

export function renderPeers(peers: string[]): string {
  return peers.map(peer => `<li>${peer}</li>`).join('');
}

/**
 * Render the diagnostics page
 */
export function renderPage(content: PageContent): string {
  const [top, form, store, bottom] = PAGE_TEMPLATE.split(PART);
  return top + renderPeers(content.peers) + form + content.code + store + content.storeContents + bottom;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

/**
 * Generate a minimal error page
 */
export function getErrorHTML(title: string, message: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>Error - ${escapeHtml(title)}</title>
</head>
<body>
  <h1>${escapeHtml(title)}</h1>
  <p>${escapeHtml(message)}</p>
</body>
</html>`;
}
