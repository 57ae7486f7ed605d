/**
 * Response Template Tests
 * @module tests/unit/response-template
 */

import { describe, it, expect } from 'vitest';
import { InvalidResponseError } from '../../src/errors/index.js';
import { ResponseTemplate } from '../../src/mocks/response-template.js';

describe('ResponseTemplate', () => {
  it('starts empty', () => {
    const template = ResponseTemplate.withStatus(204);
    expect(template.status).toBe(204);
    expect(template.headers.size).toBe(0);
    expect(template.body.length).toBe(0);
    expect(template.delayMs).toBe(0);
  });

  it('notFound is a bare 404', () => {
    const template = ResponseTemplate.notFound();
    expect(template.status).toBe(404);
    expect(template.body.length).toBe(0);
  });

  it('builder methods return new templates', () => {
    const base = ResponseTemplate.ok();
    const withHeader = base.header('X-Mock', 'yes');
    expect(base.headers.has('x-mock')).toBe(false);
    expect(withHeader.headers.get('x-mock')).toBe('yes');
    expect(withHeader).not.toBe(base);
  });

  it('statusCode replaces the status', () => {
    expect(ResponseTemplate.ok().statusCode(503).status).toBe(503);
  });

  it('rejects out-of-range status codes', () => {
    expect(() => ResponseTemplate.withStatus(99)).toThrow(InvalidResponseError);
    expect(() => ResponseTemplate.withStatus(600)).toThrow(InvalidResponseError);
    expect(() => ResponseTemplate.ok().statusCode(200.5)).toThrow(InvalidResponseError);
  });

  it('header replaces and appendHeader accumulates', () => {
    const template = ResponseTemplate.ok()
      .header('set-cookie', 'a=1')
      .appendHeader('Set-Cookie', 'b=2')
      .header('x-replaced', 'old')
      .header('X-Replaced', 'new');
    expect(template.headers.getAll('set-cookie')).toEqual(['a=1', 'b=2']);
    expect(template.headers.getAll('x-replaced')).toEqual(['new']);
  });

  it('headersFrom merges a record', () => {
    const template = ResponseTemplate.ok().header('a', '1').headersFrom({ a: '2', b: ['3', '4'] });
    expect(template.headers.toJSON()).toEqual({ a: ['2'], b: ['3', '4'] });
  });

  it('bodyString sets a text content type', () => {
    const template = ResponseTemplate.ok().bodyString('up');
    expect(template.body.toString('utf8')).toBe('up');
    expect(template.headers.get('content-type')).toBe('text/plain; charset=utf-8');
  });

  it('bodyJson serializes and sets a JSON content type', () => {
    const template = ResponseTemplate.withStatus(201).bodyJson({ id: 42 });
    expect(template.body.toString('utf8')).toBe('{"id":42}');
    expect(template.headers.get('content-type')).toBe('application/json');
  });

  it('keeps an explicit content type', () => {
    const template = ResponseTemplate.ok().header('content-type', 'application/vnd.test+json').bodyJson([1]);
    expect(template.headers.get('content-type')).toBe('application/vnd.test+json');
  });

  it('bodyJson rejects values JSON cannot represent', () => {
    expect(() => ResponseTemplate.ok().bodyJson(undefined)).toThrow(InvalidResponseError);
  });

  it('bodyBytes copies its input', () => {
    const bytes = Uint8Array.from([1, 2, 3]);
    const template = ResponseTemplate.ok().bodyBytes(bytes, 'application/octet-stream');
    bytes[0] = 9;
    expect([...template.body]).toEqual([1, 2, 3]);
    expect(template.headers.get('content-type')).toBe('application/octet-stream');
  });

  it('body getter returns a copy', () => {
    const template = ResponseTemplate.ok().bodyString('abc');
    template.body.write('x');
    expect(template.body.toString('utf8')).toBe('abc');
  });

  it('delay', () => {
    expect(ResponseTemplate.ok().delay(25).delayMs).toBe(25);
    expect(() => ResponseTemplate.ok().delay(-1)).toThrow(InvalidResponseError);
  });
});
