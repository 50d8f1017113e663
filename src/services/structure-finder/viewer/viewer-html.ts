/**
 * @fileoverview Renders a standalone HTML page that shows a PDB structure in a
 * 3Dmol.js viewer (spectrum-coloured cartoon, zoomed to fit).
 * @module src/services/structure-finder/viewer/viewer-html
 */

export const VIEWER_SCRIPT_URL = 'https://3Dmol.org/build/3Dmol-min.js';
export const VIEWER_WIDTH = 900;
export const VIEWER_HEIGHT = 600;

export interface ViewerPageOptions {
  width?: number;
  height?: number;
  scriptUrl?: string;
}

const SCRIPT_UNSAFE: Record<string, string> = {
  '<': '\\u003c',
  '>': '\\u003e',
  '&': '\\u0026',
  '\u2028': '\\u2028',
  '\u2029': '\\u2029',
};

/**
 * JSON-encode a value for inline use inside a `<script>` element.
 */
export function toScriptLiteral(value: unknown): string {
  return JSON.stringify(value).replace(
    /[<>&\u2028\u2029]/g,
    (ch) => SCRIPT_UNSAFE[ch] ?? ch,
  );
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Count ATOM and HETATM records in PDB-format text.
 */
export function countAtomRecords(pdbText: string): number {
  let count = 0;
  for (const line of pdbText.split(/\r?\n/)) {
    if (line.startsWith('ATOM  ') || line.startsWith('HETATM')) count++;
  }
  return count;
}

export function renderViewerHtml(
  pdbId: string,
  pdbText: string,
  options: ViewerPageOptions = {},
): string {
  const width = options.width ?? VIEWER_WIDTH;
  const height = options.height ?? VIEWER_HEIGHT;
  const scriptUrl = options.scriptUrl ?? VIEWER_SCRIPT_URL;
  const title = escapeHtml(pdbId);

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${title} - 3D structure</title>
<script src="${escapeHtml(scriptUrl)}"></script>
</head>
<body>
<div id="viewer" style="width: ${width}px; height: ${height}px; position: relative;"></div>
<script>
(function () {
  var data = ${toScriptLiteral(pdbText)};
  var viewer = $3Dmol.createViewer(document.getElementById("viewer"), { backgroundColor: "white" });
  viewer.addModel(data, "pdb");
  viewer.setStyle({}, { cartoon: { color: "spectrum" } });
  viewer.zoomTo();
  viewer.render();
})();
</script>
</body>
</html>
`;
}
