import ExcelJS from 'exceljs';
import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { createApp } from '../src/app.js';
import { LatestResultStore } from '../src/repositories/resultStore.js';
import { DEFAULT_SELECTORS } from '../src/scraper/selectors.js';
import { ANDHERI_CARD, card, fakeHttp, fakeLogger, page } from './fixtures.js';

const LISTINGS_URL = 'https://listings.example.test/flats-for-sale-in-mumbai';

function setup(status: number, body: string) {
  const logger = fakeLogger();
  const store = new LatestResultStore();
  const { http, adapter } = fakeHttp(status, body);
  const app = createApp({ logger, store, http, selectors: DEFAULT_SELECTORS });
  return { app, logger, store, adapter };
}

describe('GET /health', () => {
  it('reports ok', async () => {
    const { app } = setup(200, '');
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });
});

describe('POST /v1/scrape', () => {
  it('returns 400 NO_INPUT without fetching when the URL is missing', async () => {
    const { app, adapter } = setup(200, page(card(ANDHERI_CARD)));

    const res = await request(app).post('/v1/scrape').send({});

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'NO_INPUT', message: 'Please enter a valid URL.' });
    expect(adapter).not.toHaveBeenCalled();
  });

  it('returns 400 on a malformed body', async () => {
    const { app } = setup(200, '');

    const res = await request(app).post('/v1/scrape').send({ url: 42 });

    expect(res.status).toBe(400);
    expect(res.body?.error).toBe('VALIDATION_ERROR');
  });

  it('returns 502 FETCH_FAILED and logs the status when the page cannot be fetched', async () => {
    const { app, logger, store } = setup(404, 'Not Found');

    const res = await request(app).post('/v1/scrape').send({ url: LISTINGS_URL });

    expect(res.status).toBe(502);
    expect(res.body).toEqual({ error: 'FETCH_FAILED', message: 'Failed to retrieve the HTML content.' });
    expect(logger.error).toHaveBeenCalledWith('Failed to fetch page: 404');
    expect(store.latest()).toBeUndefined();
  });

  it('returns an empty table with a message when no listings are found', async () => {
    const { app, logger, store } = setup(200, page('<p>No results</p>'));

    const res = await request(app).post('/v1/scrape').send({ url: LISTINGS_URL });

    expect(res.status).toBe(200);
    expect(res.body.properties).toEqual([]);
    expect(res.body.message).toBe('No properties found or parsed. Check selectors.');
    expect(logger.error).not.toHaveBeenCalled();
    expect(store.latest()).toBeUndefined();
  });

  it('returns sentinel-filled rows in column order and keeps the result', async () => {
    const { price: _price, ...withoutPrice } = ANDHERI_CARD;
    const { app, store } = setup(200, page(card(withoutPrice)));

    const res = await request(app).post('/v1/scrape').send({ url: LISTINGS_URL });

    expect(res.status).toBe(200);
    expect(res.body.url).toBe(LISTINGS_URL);
    expect(res.body.columns).toEqual(['location', 'property_type', 'price', 'size', 'bedrooms', 'sold_by']);
    expect(res.body.properties).toEqual([
      {
        location: 'Andheri West',
        property_type: 'Flat',
        price: 'Price Not Available',
        size: '650 sqft',
        bedrooms: '2',
        sold_by: 'Sharma Realty'
      }
    ]);
    expect(Object.keys(res.body.properties[0])).toEqual(res.body.columns);
    expect(store.latest()?.records).toHaveLength(1);
  });
});

describe('GET /v1/scrape/latest', () => {
  it('returns 404 before any successful scrape', async () => {
    const { app } = setup(200, '');

    const res = await request(app).get('/v1/scrape/latest');

    expect(res.status).toBe(404);
    expect(res.body?.error).toBe('NOT_FOUND');
  });

  it('returns the most recent successful result', async () => {
    const { app } = setup(200, page(card(ANDHERI_CARD)));
    await request(app).post('/v1/scrape').send({ url: LISTINGS_URL });

    const res = await request(app).get('/v1/scrape/latest');

    expect(res.status).toBe(200);
    expect(res.body.url).toBe(LISTINGS_URL);
    expect(res.body.properties).toHaveLength(1);
    expect(res.body.properties[0].price).toBe('₹1.25 Cr');
  });
});

describe('GET /v1/scrape/latest/export', () => {
  it('returns 404 when there is nothing to export', async () => {
    const { app } = setup(200, '');

    const res = await request(app).get('/v1/scrape/latest/export');

    expect(res.status).toBe(404);
  });

  it('downloads the last result as properties_data.xlsx', async () => {
    const { app } = setup(200, page(card(ANDHERI_CARD)));
    await request(app).post('/v1/scrape').send({ url: LISTINGS_URL });

    const res = await request(app).get('/v1/scrape/latest/export').responseType('blob');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe(
      'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'
    );
    expect(res.headers['content-disposition']).toBe('attachment; filename="properties_data.xlsx"');

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(res.body);
    const sheet = workbook.getWorksheet('Properties');
    expect(sheet?.rowCount).toBe(2);
    expect(sheet?.getRow(2).getCell(1).value).toBe('Andheri West');
    expect(sheet?.getRow(2).getCell(6).value).toBe('Sharma Realty');
  });
});
