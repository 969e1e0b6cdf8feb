import React, { useEffect, useRef, useState } from 'react';
import { AlertTriangle, Loader2, MessageCircle, Send, Sparkles } from 'lucide-react';
import type { ChatMessage } from '../types';
import { useTheme } from '../context/ThemeContext';
import MarkdownText from './MarkdownText';

interface FollowUpChatProps {
  hasReport: boolean;
  messages: ChatMessage[];
  pendingQuestion: string | null; // shown until the reply lands in `messages`
  disabled?: boolean; // another model call is running
  refusal?: string | null;
  onAsk: (question: string) => void;
}

const FollowUpChat: React.FC<FollowUpChatProps> = ({ hasReport, messages, pendingQuestion, disabled = false, refusal = null, onAsk }) => {
  const { isDark } = useTheme();
  const [chatQuery, setChatQuery] = useState('');
  const chatEndRef = useRef<HTMLDivElement>(null);
  const isAnswering = pendingQuestion !== null;
  const isLocked = isAnswering || disabled;

  useEffect(() => chatEndRef.current?.scrollIntoView?.({ behavior: 'smooth' }), [messages, pendingQuestion]);

  const handleSendMessage = (e: React.FormEvent) => {
    e.preventDefault();
    if (!chatQuery.trim() || isLocked) return;
    const q = chatQuery;
    setChatQuery('');
    onAsk(q);
  };

  const bubble = (role: ChatMessage['role']) =>
    role === 'user'
      ? 'ml-auto bg-emerald-600 text-white rounded-tr-none'
      : `mr-auto rounded-tl-none border ${isDark ? 'bg-stone-800 border-stone-700' : 'bg-stone-50 border-stone-100'}`;

  return (
    <section
      aria-label="Follow-up questions"
      className={`rounded-3xl p-6 shadow-xl border ${isDark ? 'bg-stone-900 border-stone-800' : 'bg-white border-stone-100'}`}
    >
      <h2 className="text-lg font-bold mb-1 flex items-center gap-2"><MessageCircle className="text-emerald-600" /> Follow-up questions</h2>

      {!hasReport ? (
        <p className="text-sm text-stone-400 mt-3">Generate a resilience plan above first. Then you can ask follow-up questions here.</p>
      ) : (
        <>
          <p className="text-xs text-stone-400 mb-4">Ask about your plan or ask for another report. Answers use your last generated plan.</p>

          <ul className="space-y-3 max-h-[480px] overflow-y-auto pr-1">
            {messages.map((message, i) => (
              <li key={i} data-role={message.role} className={`max-w-[85%] px-4 py-3 rounded-2xl text-sm ${bubble(message.role)}`}>
                {message.role === 'assistant' ? <MarkdownText>{message.content}</MarkdownText> : message.content}
              </li>
            ))}
            {isAnswering && (
              <>
                <li data-role="user" className={`max-w-[85%] px-4 py-3 rounded-2xl text-sm ${bubble('user')}`}>{pendingQuestion}</li>
                <li className="flex items-center gap-2 text-sm text-stone-400"><Sparkles size={14} /> Thinking…</li>
              </>
            )}
          </ul>
          <div ref={chatEndRef} />

          <form onSubmit={handleSendMessage} className="mt-4 flex gap-2">
            <input
              type="text"
              aria-label="Follow-up question"
              value={chatQuery}
              disabled={isLocked}
              onChange={e => setChatQuery(e.target.value)}
              placeholder="Ask a follow-up about your plan…"
              className={`flex-1 px-4 py-3 border rounded-xl outline-none focus:ring-2 focus:ring-emerald-500 ${isDark ? 'bg-stone-800 border-stone-700' : 'bg-stone-50 border-stone-200'}`}
            />
            <button
              type="submit"
              aria-label="Send question"
              disabled={isLocked || !chatQuery.trim()}
              className="px-4 rounded-xl bg-emerald-600 text-white hover:bg-emerald-500 disabled:opacity-50 disabled:cursor-not-allowed"
            >
              {isAnswering ? <Loader2 className="animate-spin" size={18} /> : <Send size={18} />}
            </button>
          </form>
          {refusal && (
            <p role="alert" className="mt-2 text-sm text-red-500 flex items-center gap-2"><AlertTriangle size={14} /> {refusal}</p>
          )}
        </>
      )}
    </section>
  );
};

export default FollowUpChat;
