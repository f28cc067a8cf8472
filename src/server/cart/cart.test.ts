import { describe, expect, it } from 'vitest';

import { ValidationError } from '@/lib/errors';
import { Cart } from './cart';

const limits = { allowedTypes: ['png', 'jpg', 'jpeg', 'pdf'], maxBytes: 16 };
const png = (n = 10) => ({ bytes: new Uint8Array(n), filename: 'scan.png', mimeType: 'image/png' });

describe('Cart', () => {
  it('stages items in FIFO order', () => {
    const cart = new Cart(limits, () => 42);
    cart.stage('first');
    cart.stage('second', png());

    const items = cart.items();
    expect(items.map((i) => i.content)).toEqual(['first', 'second']);
    expect(items[0].attachment).toBeUndefined();
    expect(items[1].attachment?.filename).toBe('scan.png');
    expect(items[1].stagedAt).toBe(42);
    expect(cart.size).toBe(2);
  });

  it('rejects empty content', () => {
    const cart = new Cart(limits);
    expect(() => cart.stage('')).toThrow(ValidationError);
    expect(() => cart.stage('')).toThrow('content is required');
    expect(cart.size).toBe(0);
  });

  it('accepts any non-empty text, whitespace included', () => {
    const cart = new Cart(limits);
    cart.stage(' ');
    expect(cart.items().map((i) => i.content)).toEqual([' ']);
  });

  it('rejects attachment types outside the allow-list', () => {
    const cart = new Cart(limits);
    expect(() => cart.stage('x', { bytes: new Uint8Array(3), filename: 'notes.docx', mimeType: 'application/msword' })).toThrow(
      'file type ".docx" is not allowed (allowed: png, jpg, jpeg, pdf)'
    );
    expect(() => cart.stage('x', { bytes: new Uint8Array(3), filename: 'README', mimeType: 'text/plain' })).toThrow(
      'file type "none" is not allowed'
    );
  });

  it('matches extensions case-insensitively', () => {
    const cart = new Cart(limits);
    cart.stage('x', { bytes: new Uint8Array(3), filename: 'PHOTO.JPG', mimeType: 'image/jpeg' });
    expect(cart.size).toBe(1);
  });

  it('rejects empty and oversized attachments', () => {
    const cart = new Cart(limits);
    expect(() => cart.stage('x', png(0))).toThrow('scan.png is empty');
    expect(() => cart.stage('x', png(17))).toThrow('scan.png is larger than 16 bytes');
    cart.stage('x', png(16));
    expect(cart.size).toBe(1);
  });

  it('can be listed repeatedly without changing', () => {
    const cart = new Cart(limits);
    cart.stage('only');
    const view = cart.items();
    cart.stage('later');

    expect(view.map((i) => i.content)).toEqual(['only']);
    expect(cart.items()).not.toBe(cart.items());
    expect(cart.items()).toEqual(cart.items());
  });

  it('discards everything and is idempotent', () => {
    const cart = new Cart(limits);
    cart.stage('a');
    cart.stage('b');
    cart.discardAll();
    cart.discardAll();
    expect(cart.items()).toEqual([]);
  });

  it('summarizes without bytes', () => {
    const cart = new Cart(limits);
    cart.stage('a', png(10));
    cart.stage('b');
    expect(cart.summary()).toEqual([
      { content: 'a', filename: 'scan.png', bytes: 10 },
      { content: 'b', filename: null, bytes: 0 },
    ]);
  });
});
