import React, { createContext, useContext, useState } from 'react';

interface ThemeContextValue {
  isDark: boolean;
  setDark: (isDark: boolean) => void;
}

const ThemeContext = createContext<ThemeContextValue | undefined>(undefined);

export const ThemeProvider: React.FC<{ children: React.ReactNode; initialDark?: boolean }> = ({ children, initialDark = true }) => {
  const [isDark, setDark] = useState(initialDark);
  return <ThemeContext.Provider value={{ isDark, setDark }}>{children}</ThemeContext.Provider>;
};

export const useTheme = (): ThemeContextValue => {
  const context = useContext(ThemeContext);
  if (!context) {
    throw new Error('useTheme must be used within a ThemeProvider');
  }
  return context;
};
