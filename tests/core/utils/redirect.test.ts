import { describe, expect, it } from 'vitest';

import { redirect } from '@/core/utils/redirect.js';

import { createFakeResponse } from '../../helpers/fakes.js';

describe('redirect', () => {
  it('sets 301 and Location for a permanent redirect without using the transport redirect', () => {
    const response = createFakeResponse();

    redirect(response, '/x', true);

    expect(response.status).toBe(301);
    expect(response.headers.get('Location')).toBe('/x');
    expect(response.redirects).toEqual([]);
  });

  it('delegates a temporary redirect to the transport only', () => {
    const response = createFakeResponse();

    redirect(response, '/x', false);

    expect(response.redirects).toEqual(['/x']);
    expect(response.status).toBeUndefined();
    expect(response.headers.size).toBe(0);
  });

  it('propagates transport failures', () => {
    const response = createFakeResponse();
    response.sendRedirect = () => {
      throw new Error('socket hang up');
    };

    expect(() => redirect(response, '/x', false)).toThrow('socket hang up');
  });
});
