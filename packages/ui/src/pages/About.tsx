export default function About() {
  return (
    <>
      <h2>About</h2>
      <p>
        Worked exercises from a functional front-end course, kept as a study
        archive. Each page is one chapter: a photo gallery that grows filters
        and a folder browser, JSON decoding, forms, and a to-do list that
        survives a reload.
      </p>
    </>
  );
}
