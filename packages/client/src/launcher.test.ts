// @vitest-environment jsdom
/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, afterEach, vi } from 'vitest';
import './globals.js';
import { GalleryLauncher } from './launcher.js';

const GALLERY_PAGE = `
  <div class="bd-sidebar-secondary"></div>
  <div class="sphx-glr-footer sphx-glr-footer-example">
    <div class="sphx-glr-download sphx-glr-download-python"><p><a href="plot_x.py">Download Python source code</a></p></div>
    <p class="sphx-glr-signature">Gallery generated by Sphinx-Gallery</p>
  </div>
`;

const AT_PLOT_X = { origin: 'https://docs.test', pathname: '/auto_examples/plot_x.html' };
const PLOT_X_BUNDLE = 'https://docs.test/_static/marimo/gallery/plot_x.html';
const PLOT_X_INFO = { notebookName: 'plot_x', notebookUrl: '../_static/marimo/gallery/plot_x.html' };

describe('GalleryLauncher', () => {
  afterEach(() => {
    document.head.innerHTML = '';
    document.body.innerHTML = '';
    delete window.marimoNotebookInfo;
    delete window.gtag;
  });

  describe('inject', () => {
    it('adds footer and sidebar links once', () => {
      document.body.innerHTML = GALLERY_PAGE;
      window.marimoNotebookInfo = PLOT_X_INFO;
      const launcher = new GalleryLauncher({ location: AT_PLOT_X });

      expect(launcher.inject()).toBe(2);
      expect(launcher.inject()).toBe(0);
      expect(document.querySelectorAll('.sphx-glr-download-marimo')).toHaveLength(1);
      expect(document.querySelectorAll('.marimo-sidebar-button')).toHaveLength(1);
    });

    it('builds the footer link like the other downloads', () => {
      document.body.innerHTML = GALLERY_PAGE;
      window.marimoNotebookInfo = PLOT_X_INFO;
      new GalleryLauncher({ location: AT_PLOT_X }).inject();

      const download = document.querySelector('.sphx-glr-download-marimo');
      expect(download?.className).toBe('sphx-glr-download sphx-glr-download-marimo docutils container');
      expect(download?.nextElementSibling?.className).toBe('sphx-glr-signature');

      const link = download?.querySelector('a');
      expect(link?.href).toBe(PLOT_X_BUNDLE);
      expect(link?.target).toBe('_blank');
      expect(link?.rel).toBe('noopener noreferrer');
      expect(link?.querySelector('code')?.textContent).toBe('Launch marimo notebook: plot_x.html');
      expect(link?.querySelectorAll('span.pre')).toHaveLength(7);
    });

    it('adds a sidebar section', () => {
      document.body.innerHTML = GALLERY_PAGE;
      window.marimoNotebookInfo = PLOT_X_INFO;
      new GalleryLauncher({ location: AT_PLOT_X }).inject();

      const note = document.querySelector('.bd-sidebar-secondary .sidebar-secondary-item [role="note"]');
      expect(note?.getAttribute('aria-label')).toBe('marimo link');
      expect(note?.querySelector('h3')?.textContent).toBe('Launch Interactive');
      const link = note?.querySelector('ul.this-page-menu li a.marimo-sidebar-button');
      expect(link?.textContent).toBe('Launch marimo');
      expect(link?.getAttribute('href')).toBe(PLOT_X_BUNDLE);
    });

    it('joins an existing page menu', () => {
      document.body.innerHTML = GALLERY_PAGE;
      const sidebar = document.querySelector('.bd-sidebar-secondary');
      if (!sidebar) throw new Error('missing sidebar');
      sidebar.innerHTML = '<div class="sidebar-secondary-item"><ul class="this-page-menu"><li>Show source</li></ul></div>';

      new GalleryLauncher({ location: AT_PLOT_X }).addSidebarButton(PLOT_X_INFO);

      expect(document.querySelectorAll('.this-page-menu li')).toHaveLength(2);
      expect(document.querySelector('[role="note"]')).toBeNull();
    });

    it('honors the button toggles from page info', () => {
      document.body.innerHTML = GALLERY_PAGE;
      window.marimoNotebookInfo = {
        notebookName: 'plot_x',
        notebookUrl: '../_static/marimo/gallery/plot_x.html',
        showFooterButton: false,
        showSidebarButton: true,
      };

      expect(new GalleryLauncher({ location: AT_PLOT_X }).inject()).toBe(1);
      expect(document.querySelector('.sphx-glr-download-marimo')).toBeNull();
      expect(document.querySelector('.marimo-sidebar-button')).not.toBeNull();
    });

    it('adds a standalone link on pages without a gallery footer', () => {
      document.body.innerHTML = '<div class="sidebar"></div><div class="content"></div>';
      window.marimoNotebookInfo = {
        notebookName: 'plot_x',
        notebookUrl: '../_static/marimo/gallery/plot_x.html',
        buttonText: 'Open live',
      };
      const launcher = new GalleryLauncher({ location: AT_PLOT_X });

      expect(launcher.inject()).toBe(1);
      expect(launcher.inject()).toBe(0);
      const link = document.querySelector('.sidebar .marimo-launcher-container a');
      expect(link?.textContent).toBe('Open live');
      expect(link?.getAttribute('href')).toBe(PLOT_X_BUNDLE);
    });

    it('does nothing on ordinary pages', () => {
      document.body.innerHTML = '<div class="content"></div>';
      expect(new GalleryLauncher({ location: AT_PLOT_X }).inject()).toBe(0);
      expect(document.querySelector('.content')?.children).toHaveLength(0);
    });

    it('leaves gallery pages alone when the build wrote no page info', () => {
      document.body.innerHTML = GALLERY_PAGE;
      expect(new GalleryLauncher({ location: AT_PLOT_X }).inject()).toBe(0);
      expect(document.querySelector('.sphx-glr-download-marimo')).toBeNull();
      expect(document.querySelector('.marimo-sidebar-button')).toBeNull();
    });

    it('ignores malformed page info', () => {
      document.body.innerHTML = GALLERY_PAGE;
      window.marimoNotebookInfo = { notebookName: 'plot_x' };
      expect(new GalleryLauncher({ location: AT_PLOT_X }).inject()).toBe(0);
    });

    it('links to the bundle the build placed under custom directories', () => {
      document.body.innerHTML = GALLERY_PAGE;
      window.marimoNotebookInfo = { notebookName: 'plot_x', notebookUrl: '../assets/nb/gallery/plot_x.html' };
      new GalleryLauncher({ location: { origin: 'https://docs.test', pathname: '/examples/plot_x.html' } }).inject();

      const expected = 'https://docs.test/assets/nb/gallery/plot_x.html';
      expect(document.querySelector<HTMLAnchorElement>('.sphx-glr-download-marimo a')?.href).toBe(expected);
      expect(document.querySelector<HTMLAnchorElement>('a.marimo-sidebar-button')?.href).toBe(expected);
    });
  });

  describe('extractNotebookName', () => {
    it('prefers the page URL', () => {
      document.head.innerHTML = '<script data-notebook-name="plot_z"></script>';
      expect(new GalleryLauncher({ location: AT_PLOT_X }).extractNotebookName()).toBe('plot_x');
    });

    it('falls back to the script tag, then page info', () => {
      const location = { origin: 'https://docs.test', pathname: '/auto_examples/plot_x/' };
      window.marimoNotebookInfo = { notebookName: 'plot_info', notebookUrl: 'x.html' };
      const launcher = new GalleryLauncher({ location });

      expect(launcher.extractNotebookName()).toBe('plot_info');
      document.head.innerHTML = '<script data-notebook-name="plot_z"></script>';
      expect(launcher.extractNotebookName()).toBe('plot_z');
    });

    it('returns null when nothing names the notebook', () => {
      const location = { origin: 'https://docs.test', pathname: '/' };
      expect(new GalleryLauncher({ location }).extractNotebookName()).toBeNull();
    });
  });

  describe('resolveNotebookUrl', () => {
    it('resolves page-relative info against the page', () => {
      const launcher = new GalleryLauncher({
        location: { origin: 'https://docs.test', pathname: '/docs/examples/sub/plot_a.html' },
      });
      expect(launcher.resolveNotebookUrl({ notebookName: 'sub_plot_a', notebookUrl: '../../_static/marimo/gallery/sub_plot_a.html' }))
        .toBe('https://docs.test/docs/_static/marimo/gallery/sub_plot_a.html');
    });

    it('derives the URL from the path when info has none', () => {
      const launcher = new GalleryLauncher({ location: AT_PLOT_X });
      expect(launcher.resolveNotebookUrl({ notebookName: 'plot_x', notebookUrl: '' })).toBe(PLOT_X_BUNDLE);
    });
  });

  describe('getNotebookUrl', () => {
    it('resolves from the documentation root', () => {
      const at = (pathname: string) => new GalleryLauncher({ location: { origin: 'https://docs.test', pathname } });

      expect(at('/auto_examples/plot_x.html').getNotebookUrl('plot_x')).toBe(PLOT_X_BUNDLE);
      expect(at('/docs/v2/auto_examples/plot_x.html').getNotebookUrl('plot_x'))
        .toBe('https://docs.test/docs/v2/_static/marimo/gallery/plot_x.html');
      expect(at('/examples/plot_y.html').getNotebookUrl('plot y'))
        .toBe('https://docs.test/examples/_static/marimo/gallery/plot%20y.html');
    });

    it('uses configured gallery directories', () => {
      const launcher = new GalleryLauncher({
        location: { origin: 'https://docs.test', pathname: '/docs/tutorials/basics/plot_a.html' },
        galleryDirs: ['tutorials'],
      });
      expect(launcher.getNotebookUrl('plot_a')).toBe('https://docs.test/docs/_static/marimo/gallery/plot_a.html');
    });
  });

  it('reports launches to analytics', () => {
    document.body.innerHTML = GALLERY_PAGE;
    window.marimoNotebookInfo = PLOT_X_INFO;
    const gtag = vi.fn();
    window.gtag = gtag;
    new GalleryLauncher({ location: AT_PLOT_X }).inject();

    const link = document.querySelector<HTMLAnchorElement>('.sphx-glr-download-marimo a');
    link?.addEventListener('click', event => event.preventDefault());
    link?.click();

    expect(gtag).toHaveBeenCalledWith('event', 'marimo_launch', { notebook_name: 'plot_x', event_category: 'gallery' });
  });
});
