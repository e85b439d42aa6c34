import { relativeTo, toHref } from '../../common/path';
import type { DirEntry } from '../../types/entry';
import { collectSortedFiles } from '../walker';
import { renderImage, renderLayout } from './layout';

const VIEWER_STYLESHEET = `
html { background: black; color: white; overflow: hidden; }
body { margin: 0; display: flex; height: 100vh; overflow-x: scroll; scrollbar-width: none; scroll-snap-type: x proximity; max-width: fit-content; }
img { height: 100vh; width: 100vw; object-fit: contain; scroll-snap-align: center; }
nav { position: fixed; bottom: 1em; right: 1em; background: orange; z-index: 1000; border-radius: 0.5em; }
nav a { display: block; padding: 1em; color: inherit; text-decoration: inherit; }
`;

const NAVBAR = '<nav><a href="?mode=gallery">&#9638;</a></nav>';

export class ImageView {
  constructor(private readonly base: string) {}

  async render(dir: DirEntry): Promise<string> {
    const files = await collectSortedFiles(dir);
    const images = files.map((file) => renderImage(toHref(relativeTo(this.base, file.pathname))));
    return renderLayout(VIEWER_STYLESHEET, `${NAVBAR}\n${images.join('\n')}`);
  }
}
