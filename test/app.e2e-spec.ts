import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { AppModule } from './../src/app.module';

describe('Digest API (e2e)', () => {
  let app: INestApplication;

  beforeEach(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleFixture.createNestApplication({ logger: false });
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it('/health (GET)', () => {
    return request(app.getHttpServer()).get('/health').expect(200).expect({
      status: 'ok',
      service: 'gov-signals-digest',
    });
  });

  it('/ (GET)', () => {
    return request(app.getHttpServer()).get('/').expect(200).expect({
      service: 'gov-signals-digest',
      version: '1.0.0',
    });
  });

  it('/digest (POST) composes a digest', () => {
    return request(app.getHttpServer())
      .post('/digest')
      .send({
        signals: [
          {
            source: 'congress',
            sourceId: 'hr-1',
            title: 'H.R. 1 - Secure Networks Act',
            billId: 'hr-1',
            metrics: { action_type: 'floor_vote' },
          },
          'oops',
        ],
        hoursBack: 12,
      })
      .expect(201)
      .expect((res) => {
        const body = res.body as { text: string; stats: { rejected: number } };
        expect(body.stats.rejected).toBe(1);
        expect(body.text).toContain('· 12h\nMini-stats: Bills 1 · FR 0');
        expect(body.text).toContain(
          '• [Government] Bill Action — H.R. 1 - Secure Networks Act • High',
        );
      });
  });

  it('/digest (POST) rejects a body without signals', () => {
    return request(app.getHttpServer())
      .post('/digest')
      .send({ hoursBack: 12 })
      .expect(400);
  });

  it('/digest/mini (POST) returns null text when quiet', () => {
    return request(app.getHttpServer())
      .post('/digest/mini')
      .send({ signals: [] })
      .expect(201)
      .expect({ text: null });
  });
});
