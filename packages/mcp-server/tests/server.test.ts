import { describe, it, expect, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { InsightEngine } from '@insight-desk/engine';
import { AS_OF, ScriptedLlm, makeStore, testConfig } from '../../engine/tests/fixtures.js';
import { createServer } from '../src/server.js';

const closers: (() => Promise<void>)[] = [];

async function connect() {
  const engine = new InsightEngine({
    config: testConfig(),
    store: makeStore(),
    llm: new ScriptedLlm(),
    now: () => new Date(`${AS_OF}T12:00:00Z`),
  });
  const server = createServer({ engine, caller: null });
  const client = new Client({ name: 'test-client', version: '0.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  closers.push(() => client.close(), () => server.close());
  return client;
}

afterEach(async () => {
  for (const close of closers.splice(0)) await close();
});

describe('insight-desk MCP server', () => {
  it('lists every tool', async () => {
    const client = await connect();

    const { tools } = await client.listTools();

    expect(tools.map(t => t.name).sort()).toEqual([
      'ask_question',
      'delay_report',
      'describe_schema',
      'get_forecast',
      'order_status',
      'refresh_data',
      'revenue_anomalies',
      'system_audit',
    ]);
  });

  it('calls a tool over the protocol', async () => {
    const client = await connect();

    const result = await client.callTool({
      name: 'order_status',
      arguments: { role: 'customer', identity: 'CUST_001', order_id: 'ORD_001' },
    });

    expect(result.isError).toBeFalsy();
    expect(result.content).toEqual([{ type: 'text', text: expect.stringContaining('"orderId": "ORD_001"') }]);
  });

  it('returns engine failures as tool errors', async () => {
    const client = await connect();

    const result = await client.callTool({
      name: 'system_audit',
      arguments: { role: 'customer', identity: 'CUST_001' },
    });

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([{
      type: 'text',
      text: JSON.stringify({ error: 'This request is not available for your account.', code: 'FORBIDDEN_OPERATION' }),
    }]);
  });
});
