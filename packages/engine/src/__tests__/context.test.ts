import { describe, it, expect } from 'vitest';
import { Context } from '../context/context.js';
import { NunjucksRenderer } from '../render/renderer.js';
import { ConfigurationError } from '../errors.js';
import { FakeShellRunner } from './helpers/fake-shell.js';

describe('Context', () => {
  it('should convert nested mappings into sections', () => {
    const context = new Context({ colors: { primary: '#fff', accents: ['red', 'blue'] } });

    expect(context.section('colors')).toBeInstanceOf(Context);
    expect(context.resolve('colors.primary')).toBe('#fff');
    expect(context.resolve('colors.accents.1')).toBe('blue');
  });

  it('should fall back to the greatest numeric key below the requested one', () => {
    const context = new Context({ fonts: { 1: 'A', 2: 'B' } });

    expect(context.resolve('fonts.3')).toBe('B');
    expect(context.resolve('fonts.2')).toBe('B');
    expect(context.resolve('fonts.1')).toBe('A');
  });

  it('should fall back with a single numeric key', () => {
    const context = new Context({ fonts: { 1: 'A' } });

    expect(context.resolve('fonts.5')).toBe('A');
  });

  it('should resolve nothing below the smallest numeric key', () => {
    const context = new Context({ fonts: { 2: 'B' } });

    expect(context.resolve('fonts.1')).toBeUndefined();
    expect(context.resolve('fonts.0')).toBeUndefined();
  });

  it('should not apply numeric fallback to named keys', () => {
    const context = new Context({ fonts: { 1: 'A' } });

    expect(context.resolve('fonts.mono')).toBeUndefined();
  });

  it('should deep-merge imported sections', () => {
    const context = new Context({ colors: { primary: 'black', secondary: 'grey' } });

    context.merge({ colors: { primary: 'white' }, fonts: { 1: 'Hack' } });

    expect(context.toJSON()).toEqual({
      colors: { primary: 'white', secondary: 'grey' },
      fonts: { 1: 'Hack' },
    });
  });

  it('should replace a scalar with a section and vice versa', () => {
    const context = new Context({ a: 1, b: { c: 2 } });

    context.merge({ a: { x: true }, b: 'flat' });

    expect(context.toJSON()).toEqual({ a: { x: true }, b: 'flat' });
  });

  it('should reject keys that are not identifier-safe', () => {
    const context = new Context();

    expect(() => context.set('not-valid', 1)).toThrow(ConfigurationError);
    expect(() => new Context({ 'has space': 1 })).toThrow(ConfigurationError);
  });
});

describe('NunjucksRenderer', () => {
  it('should render context values with numeric fallback', () => {
    const renderer = new NunjucksRenderer({ shell: new FakeShellRunner() });
    const context = new Context({ fonts: { 1: 'A', 2: 'B' }, user: { name: 'ada' } });

    const output = renderer.render('{{ user.name }} uses {{ fonts[3] }} and {{ fonts[1] }}', context.toRenderable());

    expect(output).toBe('ada uses B and A');
  });

  it('should render undefined values as empty text', () => {
    const renderer = new NunjucksRenderer({ shell: new FakeShellRunner() });

    expect(renderer.render('[{{ missing.value }}]', {})).toBe('[]');
  });

  it('should insert shell output through the shell filter', () => {
    const shell = new FakeShellRunner((command) =>
      command === 'hostname' ? { stdout: 'workstation\n' } : { exitCode: 1 }
    );
    const renderer = new NunjucksRenderer({ shell });

    expect(renderer.render("{{ 'hostname' | shell }}", {})).toBe('workstation');
    expect(renderer.render("{{ 'broken' | shell(1, 'fallback') }}", {})).toBe('fallback');
    expect(shell.commands[0]?.options.timeoutMs).toBe(2000);
    expect(shell.commands[1]?.options.timeoutMs).toBe(1000);
  });

  it('should report the template name on syntax errors', () => {
    const renderer = new NunjucksRenderer({ shell: new FakeShellRunner() });

    expect(() => renderer.render('{% if %}', {}, 'broken.conf')).toThrow(/Failed to render broken\.conf/);
  });
});
