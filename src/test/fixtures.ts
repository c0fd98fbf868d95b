import type { FeedEntry } from "../types/feed";

/** Five events in the shape the feed uses, one of them with an image */
export const SUMMARY_HTML = `<div>
<ul>
<li><a href="/wiki/Datei:Testbild.jpg" title="Datei:Testbild.jpg"><img alt="Ein Testbild" src="//upload.example.org/thumb/testbild-100.jpg" srcset="//upload.example.org/thumb/testbild-150.jpg 1.5x, //upload.example.org/thumb/testbild-200.jpg 2x" width="100" height="80"></a><a href="/wiki/1871" title="1871">1871</a>: In <a href="/wiki/Musterstadt" title="Musterstadt">Musterstadt</a> wird die erste Stra&shy;ßen&shy;bahn eröffnet.</li>
<li><a href="/wiki/1926" title="1926">1926</a>: Der <a href="/wiki/Beispielverein" title="Beispielverein">Beispielverein</a> wird gegründet.</li>
<li><span style="visibility:hidden;">0</span><a href="/wiki/955" title="955">955</a>: Schlacht am <a href="/wiki/Testfeld" title="Testfeld">Testfeld</a>.</li>
<li><a href="/wiki/1990" title="1990">1990</a>: Ein Ereignis ohne weitere Links.</li>
<li><a href="/wiki/2001" title="2001">2001</a>: In <a href="/wiki/Beispielhausen" title="Beispielhausen">Beispielhausen</a> tagt der <a href="/wiki/Testrat" title="Testrat">Testrat</a>.</li>
</ul>
</div>`;

export function makeEntry(updated = "2026-10-18T00:00:00Z", summary = SUMMARY_HTML): FeedEntry {
  return { updated, summary, title: "18. Oktober" };
}

function escapeXml(s: string) {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function makeAtomFeed(entries: FeedEntry[]): string {
  const items = entries
    .map(
      (e, i) => `  <entry>
    <id>https://de.wikipedia.org/wiki/Test?entry=${i}</id>
    <title>${e.title ?? "Eintrag"}</title>
    <link rel="alternate" type="text/html" href="https://de.wikipedia.org/wiki/Test?entry=${i}"/>
    <updated>${e.updated}</updated>
    <summary type="html">${escapeXml(e.summary)}</summary>
  </entry>`
    )
    .join("\n");
  return `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom" xml:lang="de">
  <id>https://de.wikipedia.org/w/api.php?action=featuredfeed&amp;feed=onthisday&amp;feedformat=atom</id>
  <title>Was geschah am</title>
  <updated>2026-10-18T00:00:00Z</updated>
${items}
</feed>`;
}
