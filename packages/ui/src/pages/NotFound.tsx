import { Link, useLocation } from "react-router-dom";

export default function NotFound() {
  const { pathname } = useLocation();

  return (
    <>
      <h2>No exercise here</h2>
      <p>
        Nothing lives at <code>{pathname}</code>. Pick a chapter from the{" "}
        <Link to="/">exercise index</Link>.
      </p>
    </>
  );
}
