import { Test, TestingModule } from '@nestjs/testing';
import { NestExpressApplication } from '@nestjs/platform-express';
import request from 'supertest';
import { App } from 'supertest/types';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DropboxStorageService } from '../src/storage/dropbox-storage.service';
import { PipelineRunner } from '../src/dispatch/pipeline/pipeline-runner';
import { DispatcherService } from '../src/dispatch/dispatcher.service';
import { ProcessedLedgerService } from '../src/ledger/processed-ledger.service';
import { computeSignature } from '../src/monitoring/webhook/webhook-signature';
import { RemoteFile } from '../src/storage/interfaces/remote-file.interface';
import { configureApp } from '../src/app.setup';
import { FakePipelineRunner } from './fakes/fake-pipeline.runner';

/**
 * Webhook E2E Test
 *
 * Boots the full application over HTTP with the Dropbox client and the
 * pipeline replaced by in-process stand-ins. The ledger, trigger records and
 * staging area live in a temp directory.
 */
describe('Dropbox webhook (e2e)', () => {
  let app: NestExpressApplication;
  let workDir: string;
  let ledgerFile: string;
  let runner: FakePipelineRunner;

  const SECRET = 'test-secret';
  const listing: RemoteFile[] = [
    { id: 'id1', name: 'old.mp4', path: '/Video Content/Final Cuts/old.mp4', size: 10 },
    { id: 'id2', name: 'new.mp4', path: '/Video Content/Final Cuts/new.mp4', size: 20 },
    { id: 'id3', name: 'notes.txt', path: '/Video Content/Final Cuts/notes.txt', size: 1 },
  ];

  const mockStorageService = {
    ensureFreshToken: jest.fn().mockResolvedValue(undefined),
    listFiles: jest.fn().mockResolvedValue({ files: listing, cursor: 'cursor-1' }),
    download: jest.fn(async (_remotePath: string, destination: string): Promise<number> => {
      await fs.mkdir(path.dirname(destination), { recursive: true });
      await fs.writeFile(destination, 'bytes');
      return 5;
    }),
  };

  function server(): App {
    return app.getHttpServer();
  }

  const notificationBody = JSON.stringify({ list_folder: { accounts: ['dbid:test'] } });

  beforeAll(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'monitor-e2e-'));
    ledgerFile = path.join(workDir, 'processed_files.json');

    // Ledger left by a previous run
    await fs.writeFile(
      ledgerFile,
      JSON.stringify({ id1: { path: '/Video Content/Final Cuts/old.mp4', processedAt: '2024-01-01T00:00:00.000Z' } }),
    );

    Object.assign(process.env, {
      MONITOR_MODE: 'webhook',
      DROPBOX_ACCESS_TOKEN: 'test-access-token',
      DROPBOX_WEBHOOK_SECRET: SECRET,
      OUTPUT_FOLDER_URL: 'https://www.dropbox.com/home/Clips',
      LEDGER_BACKEND: 'file',
      LEDGER_FILE: ledgerFile,
      CURSOR_FILE: path.join(workDir, 'watch_cursor.json'),
      STAGING_DIR: path.join(workDir, 'downloads'),
      TRIGGER_DIR: path.join(workDir, 'triggers'),
      PIPELINE_INPUT_DIR: path.join(workDir, 'input'),
    });
    delete process.env.SLACK_BOT_TOKEN;

    // Configuration is validated when the root module is loaded
    const { AppModule } = await import('../src/app.module');

    runner = new FakePipelineRunner();

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(DropboxStorageService)
      .useValue(mockStorageService)
      .overrideProvider(PipelineRunner)
      .useValue(runner)
      .compile();

    app = moduleFixture.createNestApplication<NestExpressApplication>({ bodyParser: false });
    configureApp(app);
    await app.init();
  });

  afterAll(async () => {
    await app.close();
    await fs.rm(workDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    mockStorageService.listFiles.mockClear();
    mockStorageService.download.mockClear();
  });

  describe('GET /health', () => {
    it('should report the monitor status', async () => {
      const response = await request(server()).get('/health').expect(200);

      expect(response.body).toEqual({
        status: 'ok',
        mode: 'webhook',
        watchFolder: '/Video Content/Final Cuts',
        processedFiles: 1,
        lastPollAt: null,
      });
    });
  });

  describe('GET /webhook', () => {
    it('should echo the challenge as plain text', async () => {
      const response = await request(server())
        .get('/webhook')
        .query({ challenge: 'abc123' })
        .expect(200);

      expect(response.text).toBe('abc123');
      expect(response.headers['content-type']).toMatch(/^text\/plain/);
      expect(response.headers['x-content-type-options']).toBe('nosniff');
    });

    it('should reject a request without a challenge', async () => {
      await request(server()).get('/webhook').expect(400);
    });
  });

  describe('POST /webhook', () => {
    it('should reject an invalid signature without touching the ledger', async () => {
      await request(server())
        .post('/webhook')
        .set('Content-Type', 'application/json')
        .set('X-Dropbox-Signature', computeSignature('wrong-secret', Buffer.from(notificationBody)))
        .send(notificationBody)
        .expect(403);

      await app.get(DispatcherService).drain();

      expect(mockStorageService.listFiles).not.toHaveBeenCalled();
      expect(app.get(ProcessedLedgerService).count()).toBe(1);
    });

    it('should reject a missing signature', async () => {
      await request(server())
        .post('/webhook')
        .set('Content-Type', 'application/json')
        .send(notificationBody)
        .expect(403);

      expect(mockStorageService.listFiles).not.toHaveBeenCalled();
    });

    it('should accept a signed notification and dispatch only new videos', async () => {
      const response = await request(server())
        .post('/webhook')
        .set('Content-Type', 'application/json')
        .set('X-Dropbox-Signature', computeSignature(SECRET, Buffer.from(notificationBody)))
        .send(notificationBody)
        .expect(200);

      expect(response.text).toBe('');

      await app.get(DispatcherService).drain();

      // id1 was processed before the restart and notes.txt is not a video
      expect(runner.jobs.map((job) => job.trigger.remoteId)).toEqual(['id2']);
      expect(mockStorageService.download).toHaveBeenCalledTimes(1);
      expect(mockStorageService.download).toHaveBeenCalledWith('id2', expect.any(String));

      const persisted = JSON.parse(await fs.readFile(ledgerFile, 'utf8'));
      expect(Object.keys(persisted).sort()).toEqual(['id1', 'id2']);
      expect(persisted.id2.path).toBe('/Video Content/Final Cuts/new.mp4');

      // Verify the pipeline input was cleaned up after the run
      expect(await fs.readdir(path.join(workDir, 'input'))).toEqual([]);
    });

    it('should verify the signature over a plain text body', async () => {
      const response = await request(server())
        .post('/webhook')
        .set('Content-Type', 'text/plain')
        .set('X-Dropbox-Signature', computeSignature(SECRET, Buffer.from('hello')))
        .send('hello')
        .expect(200);

      expect(response.text).toBe('');
      await app.get(DispatcherService).drain();
      expect(mockStorageService.listFiles).toHaveBeenCalledTimes(1);
    });

    it('should verify the signature over a malformed JSON body', async () => {
      const malformed = '{"list_folder": ';

      await request(server())
        .post('/webhook')
        .set('Content-Type', 'application/json')
        .set('X-Dropbox-Signature', computeSignature(SECRET, Buffer.from(malformed)))
        .send(malformed)
        .expect(200);

      await app.get(DispatcherService).drain();
      expect(mockStorageService.listFiles).toHaveBeenCalledTimes(1);
    });

    it('should reject a plain text body signed with the wrong secret', async () => {
      await request(server())
        .post('/webhook')
        .set('Content-Type', 'text/plain')
        .set('X-Dropbox-Signature', computeSignature('wrong-secret', Buffer.from('hello')))
        .send('hello')
        .expect(403);

      expect(mockStorageService.listFiles).not.toHaveBeenCalled();
    });
  });
});
