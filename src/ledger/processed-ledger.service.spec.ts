import { Test, TestingModule } from '@nestjs/testing';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ProcessedLedgerService } from './processed-ledger.service';
import { LEDGER_BACKEND } from './interfaces/ledger-backend.interface';
import { InMemoryLedgerBackend } from './backends/in-memory-ledger.backend';
import { JsonFileLedgerBackend } from './backends/json-file-ledger.backend';

describe('ProcessedLedgerService', () => {
  async function createService(backend: unknown): Promise<ProcessedLedgerService> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [ProcessedLedgerService, { provide: LEDGER_BACKEND, useValue: backend }],
    }).compile();

    const service = module.get<ProcessedLedgerService>(ProcessedLedgerService);
    await service.onModuleInit();
    return service;
  }

  describe('with an in-memory backend', () => {
    let backend: InMemoryLedgerBackend;
    let service: ProcessedLedgerService;

    beforeEach(async () => {
      backend = new InMemoryLedgerBackend({
        id1: { remoteId: 'id1', path: '/a.mp4', processedAt: '2024-01-01T00:00:00.000Z' },
      });
      service = await createService(backend);
    });

    it('should report loaded records as processed', () => {
      expect(service.hasProcessed('id1')).toBe(true);
      expect(service.hasProcessed('id2')).toBe(false);
      expect(service.count()).toBe(1);
    });

    it('should persist a new record', async () => {
      await service.markProcessed('id2', '/b.mp4', new Date('2024-02-01T12:00:00.000Z'));

      expect(service.get('id2')).toEqual({
        remoteId: 'id2',
        path: '/b.mp4',
        processedAt: '2024-02-01T12:00:00.000Z',
      });
      expect(await backend.load()).toHaveProperty('id2');
      expect(backend.saveCount).toBe(1);
    });

    it('should be idempotent when marking the same id twice', async () => {
      await service.markProcessed('id3', '/c.mp4', new Date('2024-03-01T00:00:00.000Z'));
      await expect(
        service.markProcessed('id3', '/renamed.mp4', new Date('2024-04-01T00:00:00.000Z')),
      ).resolves.toBeUndefined();

      expect(service.hasProcessed('id3')).toBe(true);
      // Verify the first record is kept and only one save happened
      expect(service.get('id3')?.path).toBe('/c.mp4');
      expect(backend.saveCount).toBe(1);
    });

    it('should serialise concurrent marks without losing any', async () => {
      await Promise.all([
        service.markProcessed('a', '/a'),
        service.markProcessed('b', '/b'),
        service.markProcessed('c', '/c'),
      ]);

      expect(Object.keys(await backend.load()).sort()).toEqual(['a', 'b', 'c', 'id1']);
    });

    it('should roll back the in-memory entry when saving fails', async () => {
      jest.spyOn(backend, 'save').mockRejectedValueOnce(new Error('disk full'));

      await expect(service.markProcessed('id4', '/d.mp4')).rejects.toThrow('disk full');

      expect(service.hasProcessed('id4')).toBe(false);

      // Verify the lock is released after a failure
      await service.markProcessed('id5', '/e.mp4');
      expect(service.hasProcessed('id5')).toBe(true);
    });
  });

  describe('with a file backend', () => {
    let workDir: string;
    let ledgerFile: string;

    beforeEach(async () => {
      workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ledger-service-'));
      ledgerFile = path.join(workDir, 'processed_files.json');
    });

    afterEach(async () => {
      await fs.rm(workDir, { recursive: true, force: true });
    });

    it('should start empty when the ledger file is corrupt', async () => {
      await fs.writeFile(ledgerFile, '{"id1": ');

      const service = await createService(new JsonFileLedgerBackend(ledgerFile));

      expect(service.count()).toBe(0);
    });

    it('should remember processed ids across restarts', async () => {
      const first = await createService(new JsonFileLedgerBackend(ledgerFile));
      await first.markProcessed('id:abc', '/launch.mp4');

      const restarted = await createService(new JsonFileLedgerBackend(ledgerFile));

      expect(restarted.hasProcessed('id:abc')).toBe(true);
      expect(restarted.get('id:abc')?.path).toBe('/launch.mp4');
    });
  });
});
