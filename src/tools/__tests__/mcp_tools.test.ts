/**
 * Integration tests for MCP tool handlers using InMemoryTransport
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'fs';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema, type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { WallweaverServer } from '../../server.js';

function textOf(result: CallToolResult): string {
    const first = result.content[0];
    return first?.type === 'text' ? first.text : '';
}

describe('MCP Tool Handlers - Integration Tests', () => {
    let server: WallweaverServer;
    let client: Client;
    let serverTransport: InMemoryTransport;
    let clientTransport: InMemoryTransport;
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'wallweaver-mcp-'));

        // Create linked pair of in-memory transports
        [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

        server = new WallweaverServer();
        await server.run(serverTransport);

        client = new Client(
            {
                name: 'test-client',
                version: '1.0.0',
            },
            {
                capabilities: {},
            }
        );
        await client.connect(clientTransport);
    });

    afterEach(async () => {
        await client.close();
        await serverTransport.close();
        await rm(dir, { recursive: true, force: true });
    });

    async function call(name: string, args: Record<string, unknown>): Promise<CallToolResult> {
        return (await client.callTool({ name, arguments: args }, CallToolResultSchema)) as CallToolResult;
    }

    it('lists every tool', async () => {
        const { tools } = await client.listTools();
        expect(tools.map((t) => t.name).sort()).toEqual(['generate_wallpaper', 'health', 'init_config']);
    });

    it('reports health', async () => {
        const parsed = JSON.parse(textOf(await call('health', {})));
        expect(parsed.ok).toBe(true);
        expect(parsed.name).toBe('wallweaver-mcp');
        expect(parsed.uptimeSec).toBeGreaterThanOrEqual(0);
        expect(parsed.generations).toHaveProperty('runs');
    });

    it('generates a wallpaper and returns a JSON summary', async () => {
        const result = await call('generate_wallpaper', {
            seed: 4,
            time: 1200,
            width: 80,
            height: 60,
            tiling: 'squares-and-triangles',
            pattern: 'free-spirals',
        });
        expect(result.isError).not.toBe(true);
        const parsed = JSON.parse(textOf(result));
        expect(parsed.ok).toBe(true);
        expect(parsed.tiling).toBe('squares-and-triangles');
        expect(parsed.pattern).toBe('free-spirals');
        expect(parsed.regionCount).toBe(3);
        expect(parsed.svg.match(/<path /g)).toHaveLength(parsed.tileCount);
    });

    it('writes the image when output_path is given', async () => {
        const outputPath = join(dir, 'out.svg');
        const parsed = JSON.parse(
            textOf(await call('generate_wallpaper', { seed: 1, time: 1200, width: 60, height: 40, output_path: outputPath }))
        );
        expect(parsed.outputPath).toBe(outputPath);
        expect(parsed.svg).toBeUndefined();
        expect((await readFile(outputPath, 'utf-8')).startsWith('<svg')).toBe(true);
    });

    it('rejects invalid arguments', async () => {
        await expect(call('generate_wallpaper', { time: 9999 })).rejects.toThrow(
            /Invalid parameters for generate_wallpaper: time/
        );
        await expect(call('generate_wallpaper', { time: 1275 })).rejects.toThrow(
            'Invalid parameters for generate_wallpaper: time: Minutes must be between 00 and 59'
        );
        await expect(call('generate_wallpaper', { tiling: 'octagons' })).rejects.toThrow(
            /Invalid parameters for generate_wallpaper: tiling/
        );
    });

    it('advertises every argument it accepts', async () => {
        const { tools } = await client.listTools();
        const generate = tools.find((t) => t.name === 'generate_wallpaper');
        expect(Object.keys(generate?.inputSchema.properties ?? {})).toContain('verbose');
    });

    it('rejects unknown tools', async () => {
        await expect(call('paint_everything', {})).rejects.toThrow(/Unknown tool: paint_everything/);
    });

    it('returns coded failures as error text', async () => {
        const result = await call('generate_wallpaper', {
            seed: 1,
            time: 1200,
            width: 40,
            height: 40,
            load_path: join(dir, 'missing.json'),
        });
        expect(result.isError).toBe(true);
        expect(textOf(result)).toMatch(/^ERROR-WW-04: Could not read scene/);
    });

    it('writes the sample configuration once', async () => {
        const path = join(dir, 'config.json');
        const first = JSON.parse(textOf(await call('init_config', { path })));
        expect(first).toEqual({ ok: true, path });
        expect(existsSync(path)).toBe(true);
        expect(JSON.parse(await readFile(path, 'utf-8'))).toHaveProperty('entry');

        const second = JSON.parse(textOf(await call('init_config', { path })));
        expect(second.ok).toBe(false);

        const forced = JSON.parse(textOf(await call('init_config', { path, overwrite: true })));
        expect(forced.ok).toBe(true);
    });
});
