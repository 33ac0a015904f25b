import { describe, it, expect } from 'vitest';
import { readSupabaseConfig } from '../client.js';

describe('DB Client - config', () => {
  it('SUPABASE_URL / SUPABASE_KEY를 읽는다', () => {
    expect(
      readSupabaseConfig({ SUPABASE_URL: 'http://localhost:54321', SUPABASE_KEY: 'test-secret' }),
    ).toEqual({ url: 'http://localhost:54321', key: 'test-secret' });
  });

  it('없으면 throw', () => {
    expect(() => readSupabaseConfig({ SUPABASE_URL: 'http://localhost:54321' })).toThrow(
      'Environment variable SUPABASE_KEY is required but not set',
    );
  });
});
