import { Link } from "wouter";

export default function NotFound() {
  return (
    <div className="page">
      <div className="notice" data-testid="text-not-found">
        <h1>404 Page Not Found</h1>
        <Link href="/">Back to search</Link>
      </div>
    </div>
  );
}
