import React from "react";
import { NavLink, Route, Routes } from "react-router-dom";

// Direct imports for SSR compatibility (no lazy loading)
import Home from "./pages/Homepage.js";
import GalleryPage from "./pages/GalleryPage.js";
import FoldersPage from "./pages/FoldersPage.js";
import TodosPage from "./pages/TodosPage.js";
import SignupPage from "./pages/SignupPage.js";
import About from "./pages/About.js";
import NotFound from "./pages/NotFound.js";
import { ErrorBoundary } from "./components/ErrorBoundary.js";

export function App() {
  return (
    <ErrorBoundary>
      <main className="page">
        <header className="header">
          <h1>Study Archive</h1>
          <nav className="nav">
            <NavLink to="/" end>Home</NavLink>
            <NavLink to="/gallery">Gallery</NavLink>
            <NavLink to="/folders">Folders</NavLink>
            <NavLink to="/todos">Todos</NavLink>
            <NavLink to="/signup">Sign up</NavLink>
            <NavLink to="/about">About</NavLink>
          </nav>
        </header>

        <section className="card">
          <Routes>
            <Route path="/" element={<Home />} />
            <Route path="/gallery" element={<GalleryPage />} />
            <Route path="/folders" element={<FoldersPage />} />
            <Route path="/todos" element={<TodosPage />} />
            <Route path="/signup" element={<SignupPage />} />
            <Route path="/about" element={<About />} />
            <Route path="*" element={<NotFound />} />
          </Routes>
        </section>
      </main>
    </ErrorBoundary>
  );
}
