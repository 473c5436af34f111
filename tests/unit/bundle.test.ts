import fs from 'fs';
import os from 'os';
import path from 'path';
import { parseBundle, readBundleFile, serializeBundle, writeBundleFile } from '../../src/lib/bundle';
import { issueCodec, pullRequestCodec } from '../../src/lib/entities';
import { InvalidFileFormatError } from '../../src/lib/errors';
import { ExportBundle } from '../../src/lib/types';

describe('bundle', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'issue-porter-bundle-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const bundle: ExportBundle = {
    issues: [
      issueCodec.parse({ number: 2, title: 'Second', body: 'b', labels: ['z', 'a'], state: 'closed' }),
      issueCodec.parse({ number: 1, title: 'First', body: null, assignees: ['dev'], milestone: 'v1' }),
    ],
    prs: [pullRequestCodec.parse({ number: 3, title: 'Change', head: 'feature', base: 'main', draft: true })],
  };

  describe('serializeBundle', () => {
    it('should write issues and prs categories with file records', () => {
      const document = JSON.parse(serializeBundle(bundle));

      expect(Object.keys(document)).toEqual(['issues', 'prs']);
      expect(document.issues[0]).toEqual({
        number: 2,
        title: 'Second',
        body: 'b',
        state: 'closed',
        labels: ['a', 'z'],
        assignees: [],
        milestone: null,
        html_url: null,
        created_at: null,
        updated_at: null,
        closed_at: null,
      });
      expect(document.prs[0]).toMatchObject({ number: 3, head: 'feature', base: 'main', draft: true });
    });

    it('should omit prs when they were not fetched', () => {
      const document = JSON.parse(serializeBundle({ issues: bundle.issues }));

      expect(Object.keys(document)).toEqual(['issues']);
    });

    it('should keep empty categories as empty arrays', () => {
      expect(JSON.parse(serializeBundle({ issues: [], prs: [] }))).toEqual({ issues: [], prs: [] });
    });
  });

  describe('parseBundle', () => {
    it('should reproduce an equal bundle after serializing', () => {
      expect(parseBundle(serializeBundle(bundle))).toEqual(bundle);
    });

    it('should accept the legacy bare array of issues', () => {
      const parsed = parseBundle(JSON.stringify([{ title: 'A', body: 'x' }, { title: 'B', body: 'y' }]));

      expect(parsed.issues.map((issue) => issue.title)).toEqual(['A', 'B']);
      expect(parsed.prs).toBeUndefined();
    });

    it('should reject text that is not JSON', () => {
      expect(() => parseBundle('{ not json', 'broken.json')).toThrow(InvalidFileFormatError);
    });

    it('should reject documents of the wrong shape', () => {
      expect(() => parseBundle('null', 'x.json')).toThrow(
        'Invalid issues file x.json: expected an array of issues or an object with an "issues" array'
      );
      expect(() => parseBundle('{"issues": null}', 'x.json')).toThrow(InvalidFileFormatError);
      expect(() => parseBundle('{"issues": [], "prs": {}}', 'x.json')).toThrow(
        'Invalid issues file x.json: "prs" must be an array'
      );
    });

    it('should point at the record that is not issue-shaped', () => {
      expect(() => parseBundle('[{"title": "ok"}, {"body": "no title"}]', 'x.json')).toThrow(
        'Invalid issues file x.json: issues[1]: title: Required'
      );
    });
  });

  describe('file I/O', () => {
    it('should write and read back the same bundle', () => {
      const file = path.join(tmpDir, 'widgets.json');

      writeBundleFile(file, bundle);

      expect(readBundleFile(file)).toEqual(bundle);
    });

    it('should raise InvalidFileFormatError for a missing file', () => {
      expect(() => readBundleFile(path.join(tmpDir, 'missing.json'))).toThrow(InvalidFileFormatError);
    });
  });
});
