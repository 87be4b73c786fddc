import { describe, it, expect, vi, beforeEach } from 'vitest';
import { renderHook, waitFor } from '@testing-library/react';
import { QueryClient, QueryClientProvider } from '@tanstack/react-query';
import { ReactNode } from 'react';
import { useCastVote, useClearMyVotes, useMyVotes, useRetractVote } from './useVotes';
import { api, ApiError } from '../api/client';
import { toast } from '../stores/toast';

vi.mock('../api/client', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../api/client')>();
  return {
    ...actual,
    api: {
      get: vi.fn(),
      post: vi.fn(),
      delete: vi.fn(),
    },
  };
});

vi.mock('../stores/toast', () => ({
  toast: {
    success: vi.fn(),
    error: vi.fn(),
    info: vi.fn(),
  },
}));

describe('vote hooks', () => {
  let queryClient: QueryClient;

  beforeEach(() => {
    vi.clearAllMocks();
    queryClient = new QueryClient({
      defaultOptions: {
        queries: { retry: false },
        mutations: { retry: false },
      },
    });
  });

  function wrapper({ children }: { children: ReactNode }) {
    return <QueryClientProvider client={queryClient}>{children}</QueryClientProvider>;
  }

  describe('useMyVotes', () => {
    it('should fetch the votes of one voter', async () => {
      vi.mocked(api.get).mockResolvedValue([]);

      const { result } = renderHook(() => useMyVotes('voter 1'), { wrapper });

      await waitFor(() => expect(result.current.isSuccess).toBe(true));
      expect(api.get).toHaveBeenCalledWith('/voters/voter%201/votes');
    });

    it('should not fetch without a token', () => {
      renderHook(() => useMyVotes(''), { wrapper });

      expect(api.get).not.toHaveBeenCalled();
    });
  });

  describe('useCastVote', () => {
    it('should post the vote and confirm it', async () => {
      vi.mocked(api.post).mockResolvedValue({
        scenarioId: 3,
        score: 4,
        voterToken: 'voter-1',
        voterName: null,
        castAt: '2024-01-01T00:00:00.000Z',
      });

      const { result } = renderHook(() => useCastVote(), { wrapper });
      result.current.mutate({ scenarioId: 3, score: 4, voterToken: 'voter-1' });

      await waitFor(() => expect(result.current.isSuccess).toBe(true));
      expect(api.post).toHaveBeenCalledWith('/scenarios/3/votes', { score: 4, voterToken: 'voter-1' });
      expect(toast.success).toHaveBeenCalledWith('Vote saved on scenario 3: 4/5');
    });

    it('should surface a rejected vote', async () => {
      vi.mocked(api.post).mockRejectedValue(
        new ApiError(409, 'Conflict', 'Voter has already voted on scenario 3')
      );

      const { result } = renderHook(() => useCastVote(), { wrapper });
      result.current.mutate({ scenarioId: 3, score: 2, voterToken: 'voter-1' });

      await waitFor(() => expect(result.current.isError).toBe(true));
      expect(toast.error).toHaveBeenCalledWith('Voter has already voted on scenario 3');
    });
  });

  describe('useRetractVote', () => {
    it('should delete the vote of this voter', async () => {
      vi.mocked(api.delete).mockResolvedValue({ removed: 1 });

      const { result } = renderHook(() => useRetractVote(), { wrapper });
      result.current.mutate({ scenarioId: 2, voterToken: 'voter-1' });

      await waitFor(() => expect(result.current.isSuccess).toBe(true));
      expect(api.delete).toHaveBeenCalledWith('/scenarios/2/votes/voter-1');
      expect(toast.info).toHaveBeenCalledWith('Vote removed');
    });
  });

  describe('useClearMyVotes', () => {
    it('should report how many votes were cleared', async () => {
      vi.mocked(api.delete).mockResolvedValue({ removed: 3 });

      const { result } = renderHook(() => useClearMyVotes(), { wrapper });
      result.current.mutate('voter-1');

      await waitFor(() => expect(result.current.isSuccess).toBe(true));
      expect(api.delete).toHaveBeenCalledWith('/voters/voter-1/votes');
      expect(toast.success).toHaveBeenCalledWith('Cleared 3 votes');
    });
  });
});
