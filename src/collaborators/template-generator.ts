/**
 * Template code generator.
 *
 * Deterministic local backend: renders a single-page scaffold from the brief
 * and checks. Used when no model-backed generator is configured and as the
 * generator behind the local server.
 */

import { ArtifactSet, cloneArtifactSet, createArtifactSet } from '../domain/artifact';
import { CodeGenerationClient, GenerationRequest } from './code-generation';

export interface TemplateGeneratorOptions {
  /** Copyright holder written into LICENSE. */
  licenseHolder?: string;
  /** Clock for the copyright year. */
  now?: () => Date;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** First non-empty line of the brief, trimmed to 80 characters. */
export function titleFromBrief(brief: string): string {
  const firstLine = brief.split('\n').map((l) => l.trim()).find((l) => l.length > 0) ?? 'Untitled app';
  return firstLine.length > 80 ? `${firstLine.slice(0, 77)}...` : firstLine;
}

function mitLicense(year: number, holder: string): string {
  return [
    'MIT License',
    '',
    `Copyright (c) ${year} ${holder}`,
    '',
    'Permission is hereby granted, free of charge, to any person obtaining a copy',
    'of this software and associated documentation files (the "Software"), to deal',
    'in the Software without restriction, including without limitation the rights',
    'to use, copy, modify, merge, publish, distribute, sublicense, and/or sell',
    'copies of the Software, and to permit persons to whom the Software is',
    'furnished to do so, subject to the following conditions:',
    '',
    'The above copyright notice and this permission notice shall be included in all',
    'copies or substantial portions of the Software.',
    '',
    'THE SOFTWARE IS PROVIDED "AS IS", WITHOUT WARRANTY OF ANY KIND, EXPRESS OR',
    'IMPLIED, INCLUDING BUT NOT LIMITED TO THE WARRANTIES OF MERCHANTABILITY,',
    'FITNESS FOR A PARTICULAR PURPOSE AND NONINFRINGEMENT. IN NO EVENT SHALL THE',
    'AUTHORS OR COPYRIGHT HOLDERS BE LIABLE FOR ANY CLAIM, DAMAGES OR OTHER',
    'LIABILITY, WHETHER IN AN ACTION OF CONTRACT, TORT OR OTHERWISE, ARISING FROM,',
    'OUT OF OR IN CONNECTION WITH THE SOFTWARE OR THE USE OR OTHER DEALINGS IN THE',
    'SOFTWARE.',
    '',
  ].join('\n');
}

export class TemplateCodeGenerator implements CodeGenerationClient {
  readonly name = 'template';
  private readonly licenseHolder: string;
  private readonly now: () => Date;

  constructor(options: TemplateGeneratorOptions = {}) {
    this.licenseHolder = options.licenseHolder ?? 'Pagewright contributors';
    this.now = options.now ?? (() => new Date());
  }

  async generate(request: GenerationRequest): Promise<ArtifactSet> {
    const title = titleFromBrief(request.brief);
    const images = request.attachments.filter((a) => a.mediaType.startsWith('image/'));

    const body = [
      `    <h1>${escapeHtml(title)}</h1>`,
      `    <p>${escapeHtml(request.brief).replace(/\n/g, '<br>')}</p>`,
      ...images.map((img) => `    <img src="${escapeHtml(img.name)}" alt="${escapeHtml(img.name)}">`),
      `    <footer>Generated ${request.existingArtifacts ? 'revision' : 'build'}</footer>`,
    ];

    const indexHtml = [
      '<!DOCTYPE html>',
      '<html lang="en">',
      '  <head>',
      '    <meta charset="utf-8">',
      '    <meta name="viewport" content="width=device-width, initial-scale=1">',
      `    <title>${escapeHtml(title)}</title>`,
      '  </head>',
      '  <body>',
      ...body,
      '  </body>',
      '</html>',
      '',
    ].join('\n');

    const readme = [
      `# ${title}`,
      '',
      request.brief.trim(),
      '',
      ...(request.checks.length > 0 ? ['## Checks', '', ...request.checks.map((c) => `- ${c}`), ''] : []),
      '## License',
      '',
      'MIT, see LICENSE.',
      '',
    ].join('\n');

    const generated = createArtifactSet([
      ['index.html', indexHtml],
      ['README.md', readme],
      ['LICENSE', mitLicense(this.now().getUTCFullYear(), this.licenseHolder)],
    ]);

    if (!request.existingArtifacts) {
      return generated;
    }

    // Revisions keep files the template does not own.
    const revised = cloneArtifactSet(request.existingArtifacts);
    for (const [path, content] of generated) {
      revised.set(path, content);
    }
    return revised;
  }
}
