import { describe, it, expect, vi } from 'vitest';
import { InsightEngine } from '../src/pipeline.js';
import { DOMAIN_EVENT_TYPES, type DomainEvent } from '../types/events.js';
import {
  ComposerUnavailable, ForbiddenOperation, PlannerUnavailable, RequestCancelled, UnknownCustomer,
} from '../types/errors.js';
import { AS_OF, ScriptedLlm, makeStore, planJson, testConfig } from './fixtures.js';

const myOrdersPlan = planJson({
  source: 'orders',
  operations: [
    { op: 'select', columns: ['id', 'status'] },
  ],
});

const totalRevenuePlan = planJson({
  source: 'revenue',
  operations: [{ op: 'aggregate', measures: [{ fn: 'sum', column: 'amount', as: 'total_revenue' }] }],
});

function createEngine(llm: ScriptedLlm, store = makeStore()) {
  const events: DomainEvent[] = [];
  const onStatus = vi.fn();
  const engine = new InsightEngine({
    config: testConfig(),
    store,
    llm,
    now: () => new Date(`${AS_OF}T12:00:00Z`),
    onStatus,
  });
  for (const type of DOMAIN_EVENT_TYPES) engine.onEvent(type, e => events.push(e));
  return { engine, events, onStatus, store };
}

describe('InsightEngine.ask', () => {
  it('answers a customer question over their own orders', async () => {
    const llm = new ScriptedLlm([myOrdersPlan], ['You have three orders.']);
    const { engine, events, onStatus } = createEngine(llm);

    const result = await engine.ask('Show my orders', 'CUST_001', 'customer');

    expect(result.answer).toBe('You have three orders.');
    expect(result.structuredResult).toEqual({
      kind: 'table',
      columns: ['id', 'status'],
      rows: [
        { id: 'ORD_001', status: 'Delivered' },
        { id: 'ORD_002', status: 'Shipped' },
        { id: 'ORD_003', status: 'Placed' },
      ],
      rowCount: 3,
      empty: false,
      moneyColumns: [],
    });
    expect(result.forecastSnapshot).toBeUndefined();
    expect(result.translation?.origin).toBe('model');
    expect(result.trace.map(t => [t.stage, t.outcome])).toEqual([
      ['snapshot', 'ok'], ['scope', 'ok'], ['translate', 'ok'], ['execute', 'ok'], ['compose', 'ok'],
    ]);
    expect(events.map(e => e.type)).toEqual([
      'QuestionReceived', 'SnapshotLoaded', 'ScopeResolved', 'PlanAccepted', 'QueryExecuted', 'AnswerComposed',
    ]);
    expect(new Set(events.filter(e => e.type !== 'SnapshotLoaded').map(e => e.requestId))).toEqual(
      new Set([result.requestId]),
    );
    expect(onStatus).toHaveBeenCalledWith('compose', 'Composing answer...');
    expect(llm.composerCalls[0].prompt).not.toContain('ORD_004');
  });

  it('resolves "today" to the request day', async () => {
    const llm = new ScriptedLlm([planJson({
      source: 'orders',
      operations: [
        { op: 'filter', where: [{ column: 'estimated_delivery', operator: 'lt', value: 'today' }] },
        { op: 'select', columns: ['id'] },
      ],
    })], ['ORD_002 is late.']);
    const { engine } = createEngine(llm);

    const result = await engine.ask('which of my orders are late?', 'CUST_001', 'customer');

    expect(result.structuredResult).toMatchObject({ rows: [{ id: 'ORD_001' }, { id: 'ORD_002' }] });
  });

  it('declines a customer question it cannot answer safely', async () => {
    const llm = new ScriptedLlm([totalRevenuePlan, totalRevenuePlan]);
    const { engine, events } = createEngine(llm);

    const result = await engine.ask('show total revenue', 'CUST_001', 'customer');

    expect(result.answer).toBe("I can't answer that with the available data.");
    expect(result.structuredResult).toBeNull();
    expect(result.trace.at(-1)).toMatchObject({ stage: 'translate', outcome: 'rejected' });
    expect(events.filter(e => e.type === 'PlanRejected')).toHaveLength(2);
    expect(llm.composerCalls).toHaveLength(0);
  });

  it('answers a business aggregate', async () => {
    const llm = new ScriptedLlm([totalRevenuePlan], ['Total revenue is $463.47.']);
    const { engine } = createEngine(llm);

    const result = await engine.ask('What is our total revenue?', 'ops', 'business');

    expect(result.structuredResult).toMatchObject({ kind: 'scalar', value: 463.47 });
    expect(llm.composerCalls[0].prompt).toContain('total_revenue: $463.47');
  });

  it('attaches the forecast to business stock questions', async () => {
    const llm = new ScriptedLlm([planJson({
      source: 'products',
      operations: [{ op: 'select', columns: ['id', 'stock_level'] }],
    })], ['Bottle is out of stock.']);
    const { engine, events } = createEngine(llm);

    const result = await engine.ask('Which products are low on stock?', 'ops', 'business');

    expect(result.forecastSnapshot?.map(r => [r.productId, r.riskLevel])).toEqual([
      ['PROD_001', 'Low'], ['PROD_002', 'Low'], ['PROD_003', 'Low'],
    ]);
    expect(events.some(e => e.type === 'ForecastComputed')).toBe(true);
  });

  it('answers an empty result without composing', async () => {
    const llm = new ScriptedLlm([planJson({
      source: 'orders',
      operations: [{ op: 'filter', where: [{ column: 'status', operator: 'eq', value: 'Delayed' }] }],
    })]);
    const { engine } = createEngine(llm);

    const result = await engine.ask('any delayed-status orders?', 'CUST_001', 'customer');

    expect(result.answer).toBe('No data available for this request.');
    expect(result.structuredResult?.empty).toBe(true);
    expect(llm.composerCalls).toHaveLength(0);
  });

  it('declines an empty question', async () => {
    const { engine } = createEngine(new ScriptedLlm());
    const result = await engine.ask('   ', 'ops', 'business');
    expect(result.answer).toBe("I can't answer that with the available data.");
  });

  it('rejects an unknown customer', async () => {
    const { engine, events } = createEngine(new ScriptedLlm());

    await expect(engine.ask('show my orders', 'CUST_999', 'customer')).rejects.toBeInstanceOf(UnknownCustomer);
    expect(events.at(-1)?.payload).toEqual({ stage: 'scope', code: 'UNKNOWN_CUSTOMER' });
  });

  it('surfaces an unavailable planner', async () => {
    const { engine } = createEngine(new ScriptedLlm([new Error('timeout')]));
    await expect(engine.ask('show my orders', 'CUST_001', 'customer')).rejects.toBeInstanceOf(PlannerUnavailable);
  });

  it('surfaces an unavailable composer', async () => {
    const { engine } = createEngine(new ScriptedLlm([myOrdersPlan], [new Error('overloaded')]));
    await expect(engine.ask('show my orders', 'CUST_001', 'customer')).rejects.toBeInstanceOf(ComposerUnavailable);
  });

  it('stops before execution when cancelled during planning', async () => {
    const controller = new AbortController();
    const llm = new ScriptedLlm([() => {
      controller.abort();
      return myOrdersPlan;
    }], ['unused']);
    const { engine, events } = createEngine(llm);

    const err = await engine.ask('show my orders', 'CUST_001', 'customer', { signal: controller.signal })
      .then(() => null, (e: unknown) => e);

    expect(err).toBeInstanceOf(RequestCancelled);
    expect(err instanceof RequestCancelled && err.stage).toBe('execute');
    expect(events.some(e => e.type === 'QueryExecuted')).toBe(false);
    expect(llm.composerCalls).toHaveLength(0);
  });

  it('reuses the table snapshot across requests until invalidated', async () => {
    const llm = new ScriptedLlm([myOrdersPlan, myOrdersPlan, myOrdersPlan], ['a', 'b', 'c']);
    const { engine, store } = createEngine(llm);

    await engine.ask('show my orders', 'CUST_001', 'customer');
    await engine.ask('show my orders', 'CUST_001', 'customer');
    expect(store.reads.get('orders')).toBe(1);

    engine.invalidate();
    await engine.ask('show my orders', 'CUST_001', 'customer');
    expect(store.reads.get('orders')).toBe(2);
  });
});

describe('InsightEngine insight operations', () => {
  it('restricts the forecast to the business role', async () => {
    const { engine } = createEngine(new ScriptedLlm());
    await expect(engine.getForecast('CUST_001', 'customer')).rejects.toBeInstanceOf(ForbiddenOperation);
    expect(await engine.getForecast('ops', 'business')).toHaveLength(3);
  });

  it('restricts revenue anomalies and the audit to the business role', async () => {
    const { engine } = createEngine(new ScriptedLlm());
    await expect(engine.revenueAnomalies('CUST_001', 'customer')).rejects.toBeInstanceOf(ForbiddenOperation);
    await expect(engine.audit('CUST_001', 'customer')).rejects.toBeInstanceOf(ForbiddenOperation);

    const audit = await engine.audit('ops', 'business');
    expect(audit.asOf).toBe(AS_OF);
    expect(audit.logistics).toBe('critical');
  });

  it('scopes order lookups and delay reports to the caller', async () => {
    const { engine } = createEngine(new ScriptedLlm());

    expect(await engine.orderStatus('ORD_004', 'CUST_001', 'customer')).toBeNull();
    expect((await engine.orderStatus('ORD_002', 'CUST_001', 'customer'))?.delayStatus).toBe('OVERDUE by 3 days');

    const mine = await engine.delayReport('CUST_001', 'customer');
    expect(mine.overdue.map(r => r.orderId)).toEqual(['ORD_002']);
    const all = await engine.delayReport('ops', 'business', { minDaysOverdue: 5 });
    expect(all.overdue.map(r => r.orderId)).toEqual(['ORD_004']);
  });

  it('describes only the tables a customer may query', () => {
    const { engine } = createEngine(new ScriptedLlm());
    expect(engine.schema('customer')).not.toContain('revenue');
    expect(engine.schema('business')).toContain('revenue');
  });
});
