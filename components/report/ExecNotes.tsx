export default function ExecNotes({ notes }: { notes: string[] }) {
  if (notes.length === 0) return <p className="muted">No notable items.</p>;
  return (
    <ul>
      {notes.map((n, i) => (
        <li key={i}>{n}</li>
      ))}
    </ul>
  );
}
