import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';
import { App } from 'supertest/types';
import { AppModule } from './../src/app.module';

interface PartDetailsResponse {
  id: number;
  partNumber: number;
  name: string;
  manufacturer: string;
  lockStatus: 'FREE' | 'LOCKED';
  parentId: number | null;
  children: number[];
  owner: string;
  approved: string | null;
}

interface ErrorResponse {
  statusCode: number;
  error: string;
  message: string | string[];
}

interface PartEventResponse {
  id: string;
  sequence: number;
  notification: { type: string; partId?: number };
}

interface AssemblyTreeNodeResponse {
  part: { id: number; name: string };
  hasChildren: boolean;
  children: AssemblyTreeNodeResponse[];
}

interface AssemblyTreeResponse {
  rootPartId: number;
  requestedDepth: number;
  nodeCount: number;
  tree: AssemblyTreeNodeResponse;
}

const originalSeedSampleData = process.env.SEED_SAMPLE_DATA;
const originalSampleDataOwner = process.env.SAMPLE_DATA_OWNER;

async function createTestApp(): Promise<INestApplication<App>> {
  const moduleFixture: TestingModule = await Test.createTestingModule({
    imports: [AppModule],
  }).compile();

  const app = moduleFixture.createNestApplication();
  await app.init();
  return app;
}

function api(app: INestApplication<App>) {
  return request(app.getHttpServer());
}

function restoreEnv(): void {
  if (originalSeedSampleData === undefined) {
    delete process.env.SEED_SAMPLE_DATA;
  } else {
    process.env.SEED_SAMPLE_DATA = originalSeedSampleData;
  }

  if (originalSampleDataOwner === undefined) {
    delete process.env.SAMPLE_DATA_OWNER;
  } else {
    process.env.SAMPLE_DATA_OWNER = originalSampleDataOwner;
  }
}

describe('Part Composition API (e2e)', () => {
  let app: INestApplication<App>;

  beforeEach(async () => {
    process.env.SEED_SAMPLE_DATA = 'false';
    app = await createTestApp();
  });

  afterEach(async () => {
    await app.close();
  });

  afterAll(() => {
    restoreEnv();
  });

  async function mintPart(
    caller: string,
    partNumber: number,
    owner?: string,
  ): Promise<PartDetailsResponse> {
    const response = await api(app)
      .post('/parts')
      .set('x-account-id', caller)
      .send({
        owner,
        partNumber,
        name: `Part ${partNumber}`,
        manufacturer: 'Acme Fabrication',
      })
      .expect(201);

    return response.body as PartDetailsResponse;
  }

  async function assembleParts(
    caller: string,
    partIds: number[],
  ): Promise<PartDetailsResponse> {
    const response = await api(app)
      .post('/assemblies')
      .set('x-account-id', caller)
      .send({
        partNumber: 500,
        name: 'Bracket Pair',
        manufacturer: 'Acme Fabrication',
        partIds,
      })
      .expect(201);

    return response.body as PartDetailsResponse;
  }

  it('/health (GET)', async () => {
    await api(app).get('/health').expect(200).expect({
      status: 'ok',
      service: 'part-composition',
    });
  });

  it('mints a free part owned by the caller', async () => {
    const created = await mintPart('alice', 7);

    expect(created).toEqual({
      id: 1,
      partNumber: 7,
      name: 'Part 7',
      manufacturer: 'Acme Fabrication',
      lockStatus: 'FREE',
      parentId: null,
      children: [],
      owner: 'alice',
      approved: null,
    });

    const searchResponse = await api(app)
      .get('/parts')
      .query({ q: 'part 7' })
      .expect(200);

    expect(searchResponse.body).toEqual([
      {
        id: 1,
        partNumber: 7,
        name: 'Part 7',
        manufacturer: 'Acme Fabrication',
        lockStatus: 'FREE',
        owner: 'alice',
      },
    ]);
  });

  it('requires the caller header on mutations', async () => {
    await api(app)
      .post('/parts')
      .send({ partNumber: 1, name: 'Bolt', manufacturer: 'Acme' })
      .expect(401);
  });

  it('assembles two parts and takes them apart again', async () => {
    const partA = await mintPart('alice', 1);
    const partB = await mintPart('alice', 2);

    const assembly = await assembleParts('alice', [partA.id, partB.id]);

    expect(assembly.id).toBe(3);
    expect(assembly.children).toEqual([1, 2]);

    await api(app)
      .get('/parts/1/relations')
      .expect(200)
      .expect({ parentId: 3, children: [] });

    await api(app)
      .delete('/assemblies/3')
      .set('x-account-id', 'alice')
      .expect(200)
      .expect({ assemblyId: 3, releasedPartIds: [1, 2] });

    const missingResponse = await api(app).get('/parts/3').expect(404);
    expect((missingResponse.body as ErrorResponse).error).toBe('NOT_FOUND');

    await api(app)
      .get('/parts/1/attributes')
      .expect(200)
      .expect({
        partNumber: 1,
        name: 'Part 1',
        manufacturer: 'Acme Fabrication',
        lockStatus: 'FREE',
      });
  });

  it('attaches and detaches parts, collapsing a two-part assembly', async () => {
    await mintPart('alice', 1);
    await mintPart('alice', 2);
    await mintPart('alice', 3);
    await assembleParts('alice', [1, 2]);

    const attachResponse = await api(app)
      .post('/assemblies/4/parts')
      .set('x-account-id', 'alice')
      .send({ partIds: [3] })
      .expect(201);
    expect((attachResponse.body as PartDetailsResponse).children).toEqual([
      1, 2, 3,
    ]);

    await api(app)
      .delete('/assemblies/4/parts/3')
      .set('x-account-id', 'alice')
      .expect(200)
      .expect({ outcome: 'DETACHED', assemblyId: 4, partId: 3 });

    await api(app)
      .delete('/assemblies/4/parts/1')
      .set('x-account-id', 'alice')
      .expect(200)
      .expect({
        outcome: 'DISASSEMBLED',
        assemblyId: 4,
        releasedPartIds: [1, 2],
      });

    await api(app).get('/parts/4').expect(404);
  });

  it('rejects an eleven-part assembly as invalid input', async () => {
    const partIds: number[] = [];
    for (let partNumber = 1; partNumber <= 11; partNumber += 1) {
      partIds.push((await mintPart('alice', partNumber)).id);
    }

    const response = await api(app)
      .post('/assemblies')
      .set('x-account-id', 'alice')
      .send({
        partNumber: 500,
        name: 'Too Many',
        manufacturer: 'Acme Fabrication',
        partIds,
      })
      .expect(400);

    expect((response.body as ErrorResponse).error).toBe('INVALID_INPUT');
  });

  it('rejects parts held by two different owners', async () => {
    const mine = await mintPart('alice', 1);
    const theirs = await mintPart('alice', 2, 'bob');

    await api(app)
      .put('/accounts/bob/operators/alice')
      .set('x-account-id', 'bob')
      .send({ approved: true })
      .expect(200)
      .expect({ account: 'bob', operator: 'alice', approved: true });

    const response = await api(app)
      .post('/assemblies')
      .set('x-account-id', 'alice')
      .send({
        partNumber: 500,
        name: 'Mixed',
        manufacturer: 'Acme Fabrication',
        partIds: [mine.id, theirs.id],
      })
      .expect(422);

    expect((response.body as ErrorResponse).error).toBe('OWNER_MISMATCH');
  });

  it('reports a detach of a part that is not a child', async () => {
    await mintPart('alice', 1);
    await mintPart('alice', 2);
    await mintPart('alice', 3);
    await assembleParts('alice', [1, 2]);

    const response = await api(app)
      .delete('/assemblies/4/parts/3')
      .set('x-account-id', 'alice')
      .expect(404);
    expect((response.body as ErrorResponse).error).toBe('NOT_FOUND');

    await api(app)
      .get('/parts/4/relations')
      .expect(200)
      .expect({ parentId: null, children: [1, 2] });
  });

  it('moves a whole assembly and refuses to move a locked child', async () => {
    await mintPart('alice', 1);
    await mintPart('alice', 2);
    await assembleParts('alice', [1, 2]);

    const lockedResponse = await api(app)
      .post('/parts/1/transfer')
      .set('x-account-id', 'alice')
      .send({ to: 'bob' })
      .expect(409);
    expect((lockedResponse.body as ErrorResponse).error).toBe('INVALID_STATE');

    const transferResponse = await api(app)
      .post('/parts/3/transfer')
      .set('x-account-id', 'alice')
      .send({ to: 'bob' })
      .expect(200);
    expect((transferResponse.body as PartDetailsResponse).owner).toBe('bob');

    await api(app)
      .get('/accounts/bob/parts')
      .expect(200)
      .expect({ account: 'bob', balance: 3, partIds: [1, 2, 3] });

    const eventsResponse = await api(app).get('/parts/1/events').expect(200);
    const events = eventsResponse.body as PartEventResponse[];
    expect(events.map((event) => event.notification.type)).toEqual([
      'PART_TRANSFERRED',
      'PART_CREATED',
    ]);
  });

  it('forbids a stranger from taking an assembly apart', async () => {
    await mintPart('alice', 1);
    await mintPart('alice', 2);
    await assembleParts('alice', [1, 2]);

    const response = await api(app)
      .delete('/assemblies/3')
      .set('x-account-id', 'mallory')
      .expect(403);

    expect((response.body as ErrorResponse).error).toBe('UNAUTHORIZED');
  });

  it('refuses to manage operators for another account', async () => {
    const response = await api(app)
      .put('/accounts/bob/operators/alice')
      .set('x-account-id', 'alice')
      .send({ approved: true })
      .expect(403);

    expect((response.body as ErrorResponse).error).toBe('UNAUTHORIZED');
  });

  it('lets an approved account transfer a single part', async () => {
    await mintPart('alice', 1);

    const approvalResponse = await api(app)
      .post('/parts/1/approval')
      .set('x-account-id', 'alice')
      .send({ approved: 'carol' })
      .expect(200);
    expect((approvalResponse.body as PartDetailsResponse).approved).toBe(
      'carol',
    );

    const transferResponse = await api(app)
      .post('/parts/1/transfer')
      .set('x-account-id', 'carol')
      .send({ to: 'dave' })
      .expect(200);

    expect(transferResponse.body).toEqual(
      expect.objectContaining({ owner: 'dave', approved: null }),
    );
  });

  it('validates request bodies before they reach the engine', async () => {
    await api(app)
      .post('/assemblies')
      .set('x-account-id', 'alice')
      .send({
        partNumber: 500,
        name: 'Broken',
        manufacturer: 'Acme Fabrication',
        partIds: 'one,two',
      })
      .expect(400);

    await api(app).get('/parts/not-a-number').expect(400);
  });
});

describe('Part Composition API (e2e) - Sample Data', () => {
  let app: INestApplication<App>;

  beforeAll(async () => {
    process.env.SEED_SAMPLE_DATA = 'true';
    process.env.SAMPLE_DATA_OWNER = 'workshop';
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
    restoreEnv();
  });

  it('seeds a cart assembly for the sample owner', async () => {
    await api(app)
      .get('/accounts/workshop/parts')
      .expect(200)
      .expect({
        account: 'workshop',
        balance: 12,
        partIds: [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12],
      });

    const treeResponse = await api(app)
      .get('/assemblies/12/tree')
      .query({ depth: 'all' })
      .expect(200);
    const tree = treeResponse.body as AssemblyTreeResponse;

    expect(tree.nodeCount).toBe(12);
    expect(tree.requestedDepth).toBe(10);
    expect(tree.tree.part.name).toBe('Autonomous Cart Assembly');
    expect(tree.tree.children.map((node) => node.part.id)).toEqual([
      10, 5, 9, 11,
    ]);
  });
});
