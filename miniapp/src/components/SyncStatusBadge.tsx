import React from 'react';

interface SyncStatusBadgeProps {
  isSyncing: boolean;
  error: string | null;
}

const SyncStatusBadge: React.FC<SyncStatusBadgeProps> = ({ isSyncing, error }) => {
  if (isSyncing) {
    return (
      <div className="sync-status sync-status--syncing">
        Saving changes…
      </div>
    );
  }

  if (error) {
    return (
      <div className="sync-status sync-status--error" role="alert">
        {error}
      </div>
    );
  }

  return null;
};

export default SyncStatusBadge;
