import React, { memo } from 'react';
import ReactMarkdown, { type Components } from 'react-markdown';
import remarkGfm from 'remark-gfm';

// `node` is the mdast node react-markdown hands every renderer; it must not reach the DOM.
const components: Components = {
  h1: ({ node, ...props }) => <h1 className="text-2xl font-black mt-6 mb-3" {...props} />,
  h2: ({ node, ...props }) => <h2 className="text-xl font-bold mt-6 mb-3" {...props} />,
  h3: ({ node, ...props }) => <h3 className="text-lg font-bold mt-5 mb-2" {...props} />,
  p: ({ node, ...props }) => <p className="leading-7 my-3" {...props} />,
  ul: ({ node, ...props }) => <ul className="my-3 ml-6 list-disc space-y-1" {...props} />,
  ol: ({ node, ...props }) => <ol className="my-3 ml-6 list-decimal space-y-1" {...props} />,
  a: ({ node, ...props }) => <a className="text-emerald-600 underline underline-offset-4" target="_blank" rel="noreferrer" {...props} />,
  table: ({ node, ...props }) => <table className="my-4 w-full text-sm border-collapse" {...props} />,
  th: ({ node, ...props }) => <th className="border border-stone-300 px-3 py-2 text-left font-bold" {...props} />,
  td: ({ node, ...props }) => <td className="border border-stone-300 px-3 py-2" {...props} />,
};

const MarkdownText: React.FC<{ children: string }> = ({ children }) => (
  <ReactMarkdown remarkPlugins={[remarkGfm]} components={components}>
    {children}
  </ReactMarkdown>
);

export default memo(MarkdownText);
