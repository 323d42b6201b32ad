import React from 'react';
import './Navigation.css';
import type { Page } from '../types';

interface NavigationProps {
  currentPage: Page;
  onNavigate: (page: Page) => void;
}

const PAGES: Array<{ id: Page; label: string }> = [
  { id: 'board', label: 'Board' },
  { id: 'edit', label: 'Edit' },
];

const Navigation: React.FC<NavigationProps> = ({ currentPage, onNavigate }) => {
  return (
    <nav className="navigation">
      {PAGES.map((page) => (
        <button
          key={page.id}
          type="button"
          className={`nav-tab ${currentPage === page.id ? 'active' : ''}`}
          onClick={() => onNavigate(page.id)}
          aria-pressed={currentPage === page.id}
        >
          {page.label}
        </button>
      ))}
    </nav>
  );
};

export default Navigation;
