import { useMutation, useQueryClient } from '@tanstack/react-query';
import { api } from '../api/client';
import { toast } from '../stores/toast';

export function useResetAll() {
  const queryClient = useQueryClient();

  return useMutation({
    mutationFn: (password: string) => api.post<void>('/admin/reset', { password }),
    onSuccess: () => {
      // Every cached list is stale after a reset
      void queryClient.invalidateQueries();
      toast.success('All scenarios and votes were cleared');
    },
    onError: (error: Error) => {
      toast.error(error.message || 'Failed to reset data');
    },
  });
}
