import { basename, relativeTo, toHref } from '../../common/path';
import type { DirEntry, Entry, FileEntry } from '../../types/entry';
import { listChildren } from '../filesystem';
import { collectSortedFiles } from '../walker';
import { escapeHtml, renderImage, renderLayout } from './layout';

const GALLERY_STYLESHEET = `
html { background: black; color: white; overflow: hidden; font-family: sans-serif; }
body { margin: 0; display: flex; flex-direction: column; flex-wrap: wrap; height: 100vh; overflow-x: scroll; scrollbar-width: none; }
article { overflow-wrap: anywhere; height: 25vh; width: 25vh; position: relative; overflow: hidden; }
a { color: inherit; text-decoration: inherit; cursor: pointer; }
article img { width: 100%; height: 100%; object-fit: cover; }
article label { position: absolute; left: 0; right: 0; bottom: 0; padding: 0.5em; background: #0008; }
nav { position: absolute; bottom: 1em; right: 1em; background: orange; z-index: 1000; border-radius: 0.5em; }
nav a { display: block; padding: 1em; }
`;

const NAVBAR = '<nav><a href="?mode=viewer">&#128065;</a></nav>';

/**
 * One tile per immediate child: files show themselves, directories show
 * their first file (ordinal order) and a count of everything below them.
 */
export class GalleryView {
  constructor(private readonly base: string) {}

  async render(dir: DirEntry): Promise<string> {
    const children = await listChildren(dir.pathname);
    const tiles: string[] = [];
    for (const child of children) {
      const tile = await this.renderEntry(child);
      if (tile) {
        tiles.push(tile);
      }
    }
    const contents = tiles.join('\n');
    return renderLayout(GALLERY_STYLESHEET, `${NAVBAR}\n${contents}`);
  }

  private renderEntry(entry: Entry): Promise<string> | string {
    switch (entry.type) {
      case 'dir':
        return this.renderDir(entry);
      case 'file':
        return this.renderFile(entry);
    }
  }

  private async renderDir(dir: DirEntry): Promise<string> {
    const files = await collectSortedFiles(dir);
    const [firstFile] = files;
    if (!firstFile) {
      return '';
    }
    const label = `${basename(dir.pathname)} (${files.length})`;
    const href = this.href(dir);
    return `<article><a href="${escapeHtml(href)}">${renderImage(this.href(firstFile))}<label>${escapeHtml(label)}</label></a></article>`;
  }

  private renderFile(file: FileEntry): string {
    return `<article>${renderImage(this.href(file))}</article>`;
  }

  private href(entry: Entry): string {
    return toHref(relativeTo(this.base, entry.pathname));
  }
}
