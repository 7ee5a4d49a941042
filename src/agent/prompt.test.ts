// pattern: Functional Core

import { describe, it, expect } from 'vitest';
import { buildSingleShotPrompt, buildSystemInstruction } from './prompt.js';

describe('buildSystemInstruction', () => {
  it('carries the shell-only constraints and the search guidance', () => {
    const instruction = buildSystemInstruction();

    expect(instruction.startsWith('You are an expert macOS terminal and development environment engineer.')).toBe(true);
    expect(instruction).toContain('- Respond ONLY with valid shell commands, one per line.');
    expect(instruction).toContain('no rm -rf');
    expect(instruction.endsWith('use the web_search tool to find up-to-date information before responding.')).toBe(true);
  });

  it('is the same on every call', () => {
    expect(buildSystemInstruction()).toBe(buildSystemInstruction());
  });
});

describe('buildSingleShotPrompt', () => {
  it('appends the request after the constraints', () => {
    const prompt = buildSingleShotPrompt('install rust');

    expect(prompt).toContain('Prefer Homebrew for package installation where appropriate.');
    expect(prompt.endsWith('\n\nUser request:\ninstall rust')).toBe(true);
    expect(prompt).not.toContain('web_search');
  });

  it('interpolates only the given request', () => {
    const first = buildSingleShotPrompt('setup zsh');
    const second = buildSingleShotPrompt('install node');

    expect(first).toContain('setup zsh');
    expect(first).not.toContain('install node');
    expect(second).toContain('install node');
  });
});
