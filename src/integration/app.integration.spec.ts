import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { AppModule } from '../app.module';
import { configureApp } from '../app.setup';

/**
 * Integration Tests: full application module
 *
 * Health endpoint and write throttling with the default configuration
 */
describe('App Integration Tests', () => {
  let app: INestApplication;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = configureApp(module.createNestApplication({ logger: false }));
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it('GET /health should report an empty ledger', async () => {
    const response = await request(app.getHttpServer()).get('/health').expect(200);

    expect(response.body).toMatchObject({
      status: 'ok',
      ledger: { accounts: 0, transactions: 0 },
    });
  });

  it('should share one ledger between the health check and the API', async () => {
    await request(app.getHttpServer())
      .post('/transactions/acc1')
      .send({ type: 'deposit', amount: 100 })
      .expect(201);

    const response = await request(app.getHttpServer()).get('/health').expect(200);

    expect(response.body.ledger).toEqual({ accounts: 1, transactions: 1 });
  });

  it('should throttle bursts of writes but not reads', async () => {
    const server = app.getHttpServer();

    // short window allows 10 writes per second
    for (let i = 0; i < 10; i++) {
      await request(server)
        .post('/transactions/acc1')
        .send({ type: 'deposit', amount: 1 })
        .expect(201);
    }

    await request(server)
      .post('/transactions/acc1')
      .send({ type: 'deposit', amount: 1 })
      .expect(429);

    const balance = await request(server).get('/balance/acc1').expect(200);
    expect(balance.body).toEqual({ balance: 10 });
  });
});
