const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, (character) => HTML_ESCAPES[character] ?? character);

export const renderImage = (src: string): string =>
  `<img src="${escapeHtml(src)}" loading="lazy">`;

export const renderLayout = (stylesheet: string, body: string): string =>
  [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    '<title>swiv</title>',
    `<style>${stylesheet}</style>`,
    '</head>',
    `<body>${body}</body>`,
    '</html>',
  ].join('\n');
