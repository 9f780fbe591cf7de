import { afterEach, describe, it, expect } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { AdoptionStrategyRegistry, ImageGateEngine, silentLogger } from '@imagegate/core';
import { createImageGateServer } from '../server.js';

const engine = new ImageGateEngine({
  capabilities: {
    inspector: { name: 'fake-inspector', inspect: async () => ({ created: '2026-05-30T00:00:00Z' }) },
    scanner: { name: 'fake-scanner', scan: async () => ({ critical: 0, high: 0, medium: 0, low: 0 }) },
    verifier: { name: 'fake-verifier', verify: async () => true },
  },
  adoption: new AdoptionStrategyRegistry().register('docker.io', {
    name: 'fixed',
    assess: async () => ({ points: 15, detail: 'fixed' }),
  }),
  logger: silentLogger,
  clock: () => new Date('2026-06-01T00:00:00Z'),
});

let client: Client | undefined;

async function connect(): Promise<Client> {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await createImageGateServer(engine).connect(serverTransport);
  client = new Client({ name: 'test-client', version: '0.0.0' });
  await client.connect(clientTransport);
  return client;
}

afterEach(async () => {
  await client?.close();
  client = undefined;
});

describe('imagegate MCP server', () => {
  it('lists both tools', async () => {
    const c = await connect();
    const { tools } = await c.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual(['image_admissible', 'image_evaluate']);
  });

  it('image_admissible answers YES for an auto-approved image', async () => {
    const c = await connect();
    const result = await c.callTool({ name: 'image_admissible', arguments: { image: 'bitnami/redis:7.2' } });

    expect(result).toMatchObject({
      content: [
        {
          type: 'text',
          text: expect.stringContaining('**ADMISSIBLE: YES** ✅'),
        },
      ],
    });
  });

  it('image_admissible answers NO for an unknown vendor', async () => {
    const c = await connect();
    const result = await c.callTool({ name: 'image_admissible', arguments: { image: 'someone/app:1' } });

    expect(result).toMatchObject({
      content: [{ type: 'text', text: expect.stringContaining('**ADMISSIBLE: NO** ❌') }],
    });
  });

  it('image_evaluate returns the JSON document on request', async () => {
    const c = await connect();
    const result = await c.callTool({
      name: 'image_evaluate',
      arguments: { image: 'bitnami/redis:7.2', format: 'json' },
    });

    expect(result).toMatchObject({
      content: [{ type: 'text', text: expect.stringContaining('"decision": "auto-approve"') }],
    });
  });

  it('evaluation errors come back as tool errors', async () => {
    const c = await connect();
    const result = await c.callTool({ name: 'image_evaluate', arguments: { image: '   ' } });

    expect(result).toMatchObject({
      isError: true,
      content: [{ type: 'text', text: 'Evaluation of "" failed: An image reference is required' }],
    });
  });

  it('tool errors quote the trimmed reference', async () => {
    const c = await connect();
    const result = await c.callTool({ name: 'image_admissible', arguments: { image: ' \t ' } });

    expect(result).toMatchObject({
      isError: true,
      content: [{ type: 'text', text: 'Evaluation of "" failed: An image reference is required' }],
    });
  });
});
