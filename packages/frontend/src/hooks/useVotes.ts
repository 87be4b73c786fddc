import { useQuery, useMutation, useQueryClient } from '@tanstack/react-query';
import { api } from '../api/client';
import { toast } from '../stores/toast';
import type { Score, Vote } from '../types';
import { resultKeys } from './useResults';

export interface CastVoteInput {
  scenarioId: number;
  score: Score;
  voterToken: string;
  voterName?: string;
}

export const voteKeys = {
  all: ['votes'] as const,
  byVoter: (voterToken: string) => [...voteKeys.all, 'voter', voterToken] as const,
};

export function useMyVotes(voterToken: string) {
  return useQuery({
    queryKey: voteKeys.byVoter(voterToken),
    queryFn: () => api.get<Vote[]>(`/voters/${encodeURIComponent(voterToken)}/votes`),
    enabled: !!voterToken,
  });
}

function useInvalidateVotes() {
  const queryClient = useQueryClient();
  return (voterToken: string) => {
    void queryClient.invalidateQueries({ queryKey: voteKeys.byVoter(voterToken) });
    void queryClient.invalidateQueries({ queryKey: resultKeys.all });
  };
}

export function useCastVote() {
  const invalidate = useInvalidateVotes();

  return useMutation({
    mutationFn: ({ scenarioId, ...body }: CastVoteInput) =>
      api.post<Vote>(`/scenarios/${scenarioId}/votes`, body),
    onSuccess: (vote) => {
      invalidate(vote.voterToken);
      toast.success(`Vote saved on scenario ${vote.scenarioId}: ${vote.score}/5`);
    },
    onError: (error: Error) => {
      toast.error(error.message || 'Failed to submit vote');
    },
  });
}

export function useRetractVote() {
  const invalidate = useInvalidateVotes();

  return useMutation({
    mutationFn: ({ scenarioId, voterToken }: { scenarioId: number; voterToken: string }) =>
      api.delete<{ removed: number }>(
        `/scenarios/${scenarioId}/votes/${encodeURIComponent(voterToken)}`
      ),
    onSuccess: (_result, { voterToken }) => {
      invalidate(voterToken);
      toast.info('Vote removed');
    },
    onError: (error: Error) => {
      toast.error(error.message || 'Failed to remove vote');
    },
  });
}

export function useClearMyVotes() {
  const invalidate = useInvalidateVotes();

  return useMutation({
    mutationFn: (voterToken: string) =>
      api.delete<{ removed: number }>(`/voters/${encodeURIComponent(voterToken)}/votes`),
    onSuccess: (result, voterToken) => {
      invalidate(voterToken);
      toast.success(
        result.removed === 1 ? 'Cleared 1 vote' : `Cleared ${result.removed} votes`
      );
    },
    onError: (error: Error) => {
      toast.error(error.message || 'Failed to clear votes');
    },
  });
}
