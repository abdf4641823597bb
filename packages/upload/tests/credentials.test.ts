import { describe, it, expect, vi } from 'vitest';
import type { Target } from '@dashsync/core';
import { AuthGate, PromptCredentialSource } from '../src/credentials.js';

const local: Target = { name: 'local', url: 'http://localhost:3000' };
const server: Target = { name: 'server', url: 'https://dash.example.test' };

describe('PromptCredentialSource', () => {
  it('returns a configured password without prompting', async () => {
    const prompt = vi.fn(async () => 'unused');
    const source = new PromptCredentialSource({ username: 'researcher', password: 'test-secret', prompt });

    await expect(source.resolve(local)).resolves.toEqual({ username: 'researcher', password: 'test-secret' });
    expect(prompt).not.toHaveBeenCalled();
  });

  it('prompts once and caches the answer', async () => {
    const prompt = vi.fn(async () => 'test-secret');
    const source = new PromptCredentialSource({ username: 'researcher', prompt });

    const [first, second] = await Promise.all([source.resolve(local), source.resolve(local)]);
    const third = await source.resolve(local);

    expect(first).toEqual({ username: 'researcher', password: 'test-secret' });
    expect(second).toEqual(first);
    expect(third).toEqual(first);
    expect(prompt).toHaveBeenCalledTimes(1);
  });

  it('stops asking after an empty answer', async () => {
    const prompt = vi.fn(async () => '   ');
    const source = new PromptCredentialSource({ username: 'researcher', prompt });

    await expect(source.resolve(local)).resolves.toBeNull();
    await expect(source.resolve(local)).resolves.toBeNull();
    expect(prompt).toHaveBeenCalledTimes(1);
  });

  it('asks again after a failed prompt', async () => {
    const prompt = vi.fn<(message: string) => Promise<string>>()
      .mockRejectedValueOnce(new Error('terminal closed'))
      .mockResolvedValueOnce('test-secret');
    const source = new PromptCredentialSource({ username: 'researcher', prompt });

    await expect(source.resolve(local)).rejects.toThrow('terminal closed');
    await expect(source.resolve(local)).resolves.toEqual({ username: 'researcher', password: 'test-secret' });
    expect(prompt).toHaveBeenCalledTimes(2);
  });

  it('returns null with no password and no prompt', async () => {
    const source = new PromptCredentialSource({ username: 'researcher' });
    await expect(source.resolve(local)).resolves.toBeNull();
  });
});

describe('AuthGate', () => {
  const source = new PromptCredentialSource({ username: 'researcher', password: 'test-secret' });
  const gate = new AuthGate({ proxyHosts: ['localhost:3000'], protectedDatasets: ['privateset'] }, source);

  it('attaches credentials only for protected paths on proxied targets', async () => {
    await expect(gate.forPath(local, 'outputs/chunks/privateset/a.json'))
      .resolves.toEqual({ username: 'researcher', password: 'test-secret' });
    await expect(gate.forPath(local, 'outputs/chunks/publicset/a.json')).resolves.toBeNull();
    await expect(gate.forPath(server, 'outputs/chunks/privateset/a.json')).resolves.toBeNull();
  });

  it('gives target-wide credentials only to proxied targets', async () => {
    await expect(gate.forTarget(local)).resolves.toEqual({ username: 'researcher', password: 'test-secret' });
    await expect(gate.forTarget(server)).resolves.toBeNull();
  });

  it('returns null without a credential source', async () => {
    const bare = new AuthGate({ proxyHosts: ['localhost:3000'], protectedDatasets: ['privateset'] });
    await expect(bare.forPath(local, 'outputs/chunks/privateset/a.json')).resolves.toBeNull();
  });
});
