import React from "react";
import { Link } from "react-router-dom";
import { useHelloQuery } from "../browserApi.js";
import { useAppSelector } from "../store/hooks.js";
import { describeQueryError } from "../store/api.js";

const EXERCISES = [
  { to: "/gallery", label: "Photo gallery", blurb: "Thumbnails, sizes, Surprise Me! and filter sliders" },
  { to: "/folders", label: "Photo folders", blurb: "A recursive folder tree over one photo table" },
  { to: "/todos", label: "Todos", blurb: "A to-do list saved to localStorage" },
  { to: "/signup", label: "Sign up", blurb: "Form validation on submit" },
] as const;

export default function Home() {
  const greeting = useAppSelector((state) => state.app.message);
  const { data, error } = useHelloQuery();

  return (
    <>
      <h2>{greeting || "Home"}</h2>
      <ul className="exercises">
        {EXERCISES.map((exercise) => (
          <li key={exercise.to}>
            <Link to={exercise.to}>{exercise.label}</Link> {exercise.blurb}
          </li>
        ))}
      </ul>
      <section className="card">
        <h2>BFF check</h2>
        {error ? (
          <p className="error">Error: {describeQueryError(error)}</p>
        ) : (
          <p>{data ? data.message : "Loading..."}</p>
        )}
      </section>
    </>
  );
}
