import request from 'supertest';
import { describe, it, expect } from 'vitest';
import { app } from '../../src/api/app';

const ROOT_3 = 'fbf8b59f1ad5a1723f350e130dd75701c2b5c11a44b5ffc4e6ed48b2e1c34d8f';

const snapshots = [
  { venue: 'uniswap_v3', token0: 'WETH', token1: 'USDC', reserve0: '500000', reserve1: '500000', fee: '0.003' },
  { venue: 'sushiswap', token0: 'WETH', token1: 'USDC', reserve0: '505000', reserve1: '495000', fee: '0.003' },
];

describe('HTTP API', () => {
  it('GET /health', async () => {
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });

  it('POST /api/quote returns decimal strings', async () => {
    const res = await request(app)
      .post('/api/quote')
      .send({ amountIn: '1000', reserveIn: '500000', reserveOut: '500000', fee: '0.003' });
    expect(res.status).toBe(200);
    expect(res.body.amountIn).toBe('1000');
    expect(res.body.amountOut).toBe('995.015938219190933279041591');
    expect(res.body.spotPrice).toBe('1');
  });

  it('POST /api/quote maps validation failures to 400', async () => {
    const badReserve = await request(app)
      .post('/api/quote')
      .send({ amountIn: '1000', reserveIn: '0', reserveOut: '500000' });
    expect(badReserve.status).toBe(400);
    expect(badReserve.body.code).toBe('invalid_input');

    const notANumber = await request(app)
      .post('/api/quote')
      .send({ amountIn: 'lots', reserveIn: '1', reserveOut: '1' });
    expect(notANumber.status).toBe(400);
    expect(notANumber.body.code).toBe('invalid_request');
  });

  it('scans, then bundles the opportunity it found', async () => {
    const scan = await request(app)
      .post('/api/scan')
      .send({ snapshots, amountIn: '1000', gasCost: '5' });
    expect(scan.status).toBe(200);
    expect(scan.body.count).toBe(1);
    const [opp] = scan.body.opportunities;
    expect(opp.dex1).toBe('uniswap_v3');
    expect(opp.dex2).toBe('sushiswap');
    expect(opp.expectedProfit).toBe('5.047679102703151618627446');

    const bundle = await request(app)
      .post('/api/bundle')
      .send({ signedTxs: ['0xaa01', '0xbb02'], opportunityId: opp.id });
    expect(bundle.status).toBe(201);
    expect(bundle.body.opportunityId).toBe(opp.id);
    expect(bundle.body.name).toBe('WETH/USDC uniswap_v3->sushiswap');

    const recent = await request(app).get('/api/opportunities/recent?limit=1');
    expect(recent.body).toHaveLength(1);
    expect(recent.body[0].id).toBe(opp.id);

    const stats = await request(app).get('/api/stats');
    expect(stats.body.scans).toBe(1);
    expect(stats.body.bundlesBuilt).toBe(1);
  });

  it('POST /api/scan charges a flashloan premium when asked', async () => {
    const res = await request(app)
      .post('/api/scan')
      .send({ snapshots, amountIn: '1000', gasCost: '5', flashloan: { provider: 'aave_v3' } });
    expect(res.status).toBe(200);
    expect(res.body.opportunities[0].flashloanFee).toBe('0.5');
    expect(res.body.opportunities[0].expectedProfit).toBe('4.547679102703151618627446');
    expect(res.body.opportunities[0].riskLevel).toBe('low');
  });

  it('POST /api/scan rejects a snapshot quoting a token against itself', async () => {
    const res = await request(app)
      .post('/api/scan')
      .send({ snapshots: [{ ...snapshots[0], token1: 'WETH' }] });
    expect(res.status).toBe(400);
    expect(res.body.code).toBe('invalid_input');
  });

  it('POST /api/bundle returns 404 for an unknown opportunity', async () => {
    const res = await request(app)
      .post('/api/bundle')
      .send({ signedTxs: ['0xaa01'], opportunityId: 'opp-missing' });
    expect(res.status).toBe(404);
    expect(res.body.code).toBe('not_found');
  });

  it('POST /api/bundle rejects an empty transaction list', async () => {
    const res = await request(app).post('/api/bundle').send({ signedTxs: [] });
    expect(res.status).toBe(400);
    expect(res.body.code).toBe('invalid_request');
  });

  it('builds and verifies proofs over HTTP', async () => {
    const built = await request(app)
      .post('/api/bundle')
      .send({ signedTxs: ['tx1', 'tx2', 'tx3'], hashAlgorithm: 'sha256' });
    expect(built.status).toBe(201);
    expect(built.body.merkleRoot).toBe(ROOT_3);

    const valid = await request(app)
      .post('/api/bundle/verify')
      .send({ leaf: 'tx3', proof: built.body.proofs[2], root: ROOT_3, hashAlgorithm: 'sha256' });
    expect(valid.body).toEqual({ valid: true });

    const wrongLeaf = await request(app)
      .post('/api/bundle/verify')
      .send({ leaf: 'tx4', proof: built.body.proofs[2], root: ROOT_3, hashAlgorithm: 'sha256' });
    expect(wrongLeaf.body).toEqual({ valid: false });

    const malformed = await request(app)
      .post('/api/bundle/verify')
      .send({ leaf: 'tx3', proof: 'nope', root: ROOT_3 });
    expect(malformed.status).toBe(400);
    expect(malformed.body.code).toBe('malformed_proof');
  });

  it('GET /api/venues filters the default registry', async () => {
    const res = await request(app).get('/api/venues?chain=bsc');
    expect(res.status).toBe(200);
    expect(res.body.venues.map((v: { id: string }) => v.id)).toEqual(['pancake_v3']);
    expect(res.body.stats.totalSources).toBe(35);

    const bad = await request(app).get('/api/venues?chain=mars');
    expect(bad.status).toBe(400);
  });

  it('GET /api/config exposes defaults without relay URLs', async () => {
    const res = await request(app).get('/api/config');
    expect(res.body.profitability.minProfitThreshold).toBe('0.001');
    expect(res.body.bundles).toEqual({ hashAlgorithm: 'sha256', relayCount: 0 });
  });

  it('GET /metrics exposes scan counters', async () => {
    const res = await request(app).get('/metrics');
    expect(res.status).toBe(200);
    expect(res.text).toContain('arb_opportunities_detected_total{dex1="uniswap_v3",dex2="sushiswap"} 2');
    expect(res.text).toContain('arb_bundles_built_total 2');
  });
});
