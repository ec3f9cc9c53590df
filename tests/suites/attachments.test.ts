import { expect } from 'chai';
import { setLogLevel } from '../../src/cli/ui.js';
import { AttachmentFetcher, emptyAttachmentCounts, extractAttachment, tallyOutcome } from '../../src/sync/attachments.js';
import { DownloadError } from '../../src/types/source.js';
import { fileEvent, makeEvent, MEDIA_BASE, ScriptedSource } from '../support/fake-source.js';
import { MemoryArchiveStore } from '../support/memory-store.js';

const REF = 'mxc://hs.test/abc';
const FILE_URL = `${MEDIA_BASE}hs.test/abc`;

function clock(): () => Date {
  let tick = 0;
  return () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++));
}

describe('extractAttachment', () => {
  it('should read an image reference with its info block', () => {
    const event = makeEvent('$img', 1, {
      msgtype: 'm.image',
      body: 'cat.png',
      url: REF,
      info: { size: 2048, mimetype: 'image/png' }
    });
    expect(extractAttachment(event)).to.deep.equal({
      ref: REF,
      filename: 'cat.png',
      size: 2048,
      mimeType: 'image/png',
      isImage: true
    });
  });

  it('should prefer the filename field and take the reference from an encrypted file block', () => {
    const event = makeEvent('$file', 1, {
      msgtype: 'm.file',
      body: 'see attached',
      filename: 'report.pdf',
      file: { url: 'mxc://hs.test/enc' }
    });
    expect(extractAttachment(event)).to.deep.equal({
      ref: 'mxc://hs.test/enc',
      filename: 'report.pdf',
      size: null,
      mimeType: null,
      isImage: false
    });
  });

  it('should ignore text messages and other event types', () => {
    expect(extractAttachment(makeEvent('$t', 1))).to.equal(null);
    const member = { ...fileEvent('$m', 1, REF), type: 'm.room.member' };
    expect(extractAttachment(member)).to.equal(null);
  });
});

describe('AttachmentFetcher', () => {
  let source: ScriptedSource;
  let store: MemoryArchiveStore;

  before(() => setLogLevel('silent'));

  beforeEach(() => {
    source = new ScriptedSource();
    store = new MemoryArchiveStore();
  });

  it('should download and cache a new attachment', async () => {
    source.files.set(FILE_URL, { status: '200 OK', body: Buffer.from('hello') });
    const fetcher = new AttachmentFetcher(source, store, 1000, clock());

    const outcome = await fetcher.maybeFetch(fileEvent('$f', 1, REF));

    expect(outcome).to.deep.equal({ kind: 'fetched', ref: REF, bytes: 5, status: '200 OK' });
    const row = store.attachments.get(REF);
    expect(row?.isCached).to.equal(true);
    expect(row?.data?.toString()).to.equal('hello');
    expect(row?.fetchUrlHttp).to.equal(FILE_URL);
    expect(row?.filename).to.equal('$f.bin');
    expect(row?.lastFetchStatus).to.equal('200 OK');
  });

  it('should not download an attachment that is already cached', async () => {
    source.files.set(FILE_URL, { status: '200 OK', body: Buffer.from('hello') });
    const fetcher = new AttachmentFetcher(source, store, 1000, clock());

    await fetcher.maybeFetch(fileEvent('$f1', 1, REF));
    const outcome = await fetcher.maybeFetch(fileEvent('$f2', 2, REF));

    expect(outcome).to.deep.equal({ kind: 'already-cached', ref: REF });
    expect(source.downloads).to.deep.equal([FILE_URL]);
  });

  it('should download a shared reference once when two events race for it', async () => {
    source.files.set(FILE_URL, { status: '200 OK', body: Buffer.from('hello') });
    const fetcher = new AttachmentFetcher(source, store, 1000, clock());

    const outcomes = await Promise.all([
      fetcher.maybeFetch(fileEvent('$f1', 1, REF)),
      fetcher.maybeFetch(fileEvent('$f2', 2, REF))
    ]);

    expect(outcomes.map((o) => o?.kind)).to.deep.equal(['fetched', 'already-cached']);
    expect(source.downloads).to.have.length(1);
  });

  it('should reject a body whose declared length reaches the ceiling', async () => {
    source.files.set(FILE_URL, { status: '200 OK', body: Buffer.alloc(10) });
    const fetcher = new AttachmentFetcher(source, store, 10, clock());

    const outcome = await fetcher.maybeFetch(fileEvent('$f', 1, REF));

    expect(outcome).to.deep.equal({ kind: 'rejected', ref: REF, status: 'rejected: content-length 10 >= limit 10' });
    expect(source.cancelled).to.deep.equal([FILE_URL]);
    const row = store.attachments.get(REF);
    expect(row?.isCached).to.equal(false);
    expect(row?.data).to.equal(null);
  });

  it('should reject a body without a declared length once it reaches the ceiling', async () => {
    source.files.set(FILE_URL, { status: '200 OK', body: Buffer.alloc(12), contentLength: null });
    const fetcher = new AttachmentFetcher(source, store, 10, clock());

    const outcome = await fetcher.maybeFetch(fileEvent('$f', 1, REF));

    expect(outcome).to.deep.equal({ kind: 'rejected', ref: REF, status: 'rejected: body reached limit 10' });
    expect(store.attachments.get(REF)?.lastFetchStatus).to.equal('rejected: body reached limit 10');
  });

  it('should accept a body just under the ceiling', async () => {
    source.files.set(FILE_URL, { status: '200 OK', body: Buffer.alloc(9) });
    const fetcher = new AttachmentFetcher(source, store, 10, clock());

    const outcome = await fetcher.maybeFetch(fileEvent('$f', 1, REF));

    expect(outcome?.kind).to.equal('fetched');
  });

  it('should record a failed download and retry it on a later attempt', async () => {
    source.files.set(FILE_URL, { error: new DownloadError('404 Not Found') });
    const now = clock();
    const fetcher = new AttachmentFetcher(source, store, 1000, now);

    const first = await fetcher.maybeFetch(fileEvent('$f1', 1, REF));
    expect(first).to.deep.equal({ kind: 'failed', ref: REF, status: '404 Not Found' });
    expect(store.attachments.get(REF)?.isCached).to.equal(false);
    expect(store.attachments.get(REF)?.lastFetchStatus).to.equal('404 Not Found');

    source.files.set(FILE_URL, { status: '200 OK', body: Buffer.from('later') });
    const second = await fetcher.maybeFetch(fileEvent('$f2', 2, REF));

    expect(second?.kind).to.equal('fetched');
    const row = store.attachments.get(REF);
    expect(row?.isCached).to.equal(true);
    expect(row?.lastFetchStatus).to.equal('200 OK');
    expect(row?.lastFetchTs.toISOString()).to.equal('2024-01-01T00:00:01.000Z');
    expect(row?.retrievalTs.toISOString()).to.equal('2024-01-01T00:00:00.000Z');
  });

  it('should store transport errors with their message', async () => {
    source.files.set(FILE_URL, { error: new Error('socket hang up') });
    const fetcher = new AttachmentFetcher(source, store, 1000, clock());

    const outcome = await fetcher.maybeFetch(fileEvent('$f', 1, REF));

    expect(outcome).to.deep.equal({ kind: 'failed', ref: REF, status: 'error: socket hang up' });
  });

  it('should leave an empty body uncached', async () => {
    source.files.set(FILE_URL, { status: '200 OK', body: Buffer.alloc(0) });
    const fetcher = new AttachmentFetcher(source, store, 1000, clock());

    const outcome = await fetcher.maybeFetch(fileEvent('$f', 1, REF));

    expect(outcome).to.deep.equal({ kind: 'empty', ref: REF, status: '200 OK' });
    expect(store.attachments.get(REF)?.isCached).to.equal(false);
  });

  it('should skip references that are not content URIs', async () => {
    const fetcher = new AttachmentFetcher(source, store, 1000, clock());

    const outcome = await fetcher.maybeFetch(fileEvent('$f', 1, 'https://example.org/x.png'));

    expect(outcome).to.deep.equal({ kind: 'unresolvable', ref: 'https://example.org/x.png' });
    expect(store.attachments.size).to.equal(0);
    expect(source.downloads).to.have.length(0);
  });

  it('should skip a content URI with an upper-case scheme without storing a row', async () => {
    const fetcher = new AttachmentFetcher(source, store, 1000, clock());

    const outcome = await fetcher.maybeFetch(fileEvent('$f', 1, 'MXC://hs.test/abc'));

    expect(outcome).to.deep.equal({ kind: 'unresolvable', ref: 'MXC://hs.test/abc' });
    expect(store.attachments.size).to.equal(0);
    expect(source.downloads).to.have.length(0);
  });

  it('should stream a body past the inline limit into blob storage', async () => {
    store = new MemoryArchiveStore(6);
    source.files.set(FILE_URL, { status: '200 OK', body: Buffer.from('hello world!') });
    const fetcher = new AttachmentFetcher(source, store, 1000, clock());

    const outcome = await fetcher.maybeFetch(fileEvent('$f', 1, REF));

    expect(outcome).to.deep.equal({ kind: 'fetched', ref: REF, bytes: 12, status: '200 OK' });
    const row = store.attachments.get(REF);
    expect(row?.isCached).to.equal(true);
    expect(row?.data).to.equal(null);
    expect(row?.blobId).to.equal('000000000000000000000001');
    expect(store.blobs.bytes('000000000000000000000001')?.toString()).to.equal('hello world!');
    expect(store.blobs.blobs.get('000000000000000000000001')?.state).to.equal('finished');
  });

  it('should abort the blob upload when a spilled body reaches the ceiling', async () => {
    store = new MemoryArchiveStore(6);
    source.files.set(FILE_URL, { status: '200 OK', body: Buffer.alloc(12), contentLength: null });
    const fetcher = new AttachmentFetcher(source, store, 10, clock());

    const outcome = await fetcher.maybeFetch(fileEvent('$f', 1, REF));

    expect(outcome).to.deep.equal({ kind: 'rejected', ref: REF, status: 'rejected: body reached limit 10' });
    expect(store.blobs.blobs.get('000000000000000000000001')?.state).to.equal('aborted');
    const row = store.attachments.get(REF);
    expect(row?.isCached).to.equal(false);
    expect(row?.blobId).to.equal(null);
  });

  it('should abort the blob upload and record the error when blob storage fails', async () => {
    store = new MemoryArchiveStore(6);
    store.blobs.failWritesAfter = 6;
    source.files.set(FILE_URL, { status: '200 OK', body: Buffer.from('hello world!') });
    const fetcher = new AttachmentFetcher(source, store, 1000, clock());

    const outcome = await fetcher.maybeFetch(fileEvent('$f', 1, REF));

    expect(outcome).to.deep.equal({ kind: 'failed', ref: REF, status: 'error: blob write failed' });
    expect(store.blobs.blobs.get('000000000000000000000001')?.state).to.equal('aborted');
    expect(store.attachments.get(REF)?.isCached).to.equal(false);
  });

  it('should return null for events without an attachment', async () => {
    const fetcher = new AttachmentFetcher(source, store, 1000, clock());
    expect(await fetcher.maybeFetch(makeEvent('$t', 1))).to.equal(null);
  });

  it('should tally outcomes by kind', () => {
    const counts = emptyAttachmentCounts();
    tallyOutcome(counts, { kind: 'fetched', ref: REF, bytes: 1, status: '200 OK' });
    tallyOutcome(counts, { kind: 'failed', ref: REF, status: '404 Not Found' });
    tallyOutcome(counts, { kind: 'failed', ref: REF, status: '500 Internal Server Error' });
    tallyOutcome(counts, { kind: 'already-cached', ref: REF });
    expect(counts).to.deep.equal({ fetched: 1, empty: 0, failed: 2, rejected: 0, alreadyCached: 1, unresolvable: 0 });
  });
});
