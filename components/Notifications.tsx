import React from 'react';
import { AlertTriangle, CheckCircle2, X } from 'lucide-react';
import { Notification } from '../types';

interface NotificationsProps {
  items: Notification[];
  onDismiss: (id: number) => void;
}

const Notifications: React.FC<NotificationsProps> = ({ items, onDismiss }) => (
  <div className="fixed top-20 right-6 z-50 flex flex-col gap-2 w-96">
    {items.map(n => (
      <div
        key={n.id}
        role={n.type === 'error' ? 'alert' : 'status'}
        className={`px-4 py-3 rounded-lg shadow-lg border text-sm flex gap-2 ${
          n.type === 'error' ? 'bg-red-50 border-red-200 text-red-700' : 'bg-green-50 border-green-200 text-green-700'
        }`}
      >
        {n.type === 'error' ? <AlertTriangle size={18} className="shrink-0" /> : <CheckCircle2 size={18} className="shrink-0" />}
        <div className="flex-1">
          <p className="font-medium">{n.text}</p>
          {n.details && n.details.length > 0 && (
            <p className="mt-1 text-xs font-mono break-all">{n.details.join(', ')}</p>
          )}
        </div>
        <button onClick={() => onDismiss(n.id)} aria-label="Dismiss" className="opacity-60 hover:opacity-100">
          <X size={14} />
        </button>
      </div>
    ))}
  </div>
);

export default Notifications;
