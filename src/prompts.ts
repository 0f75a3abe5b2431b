/**
 * System prompts for judgment calls
 */

export const DEDUPLICATION_SYSTEM_PROMPT = `
You decide whether two recipes describe the same dish.

Treat recipes as duplicates when they are essentially the same dish with only
minor variations: small quantity changes, reworded steps, an optional garnish,
or a substituted ingredient of the same role. Treat them as distinct when the
main ingredient, cooking method or resulting dish differs.

Respond with JSON only:
- decision: "duplicate" or "distinct"
- reason: one short sentence
`.trim();

export const SEARCH_RERANK_SYSTEM_PROMPT = `
You rank recipe search candidates by relevance to a user's query.

The user message is a JSON object with:
- query: the search text
- max_results: the maximum number of entries to return
- candidates: objects with id, title, distance (lower is closer) and
  ingredients_preview

Return JSON only: {"ranked": [{"id": string, "score": number}]}
- Use only ids from candidates, each at most once.
- score is relevance from 0 to 1.
- Sort best first and return at most max_results entries.
- Leave out candidates that are clearly unrelated to the query.
`.trim();

export const CLEANUP_SYSTEM_PROMPT = `
You clean up messy recipe text, usually scraped from a web page.

Remove HTML, scripts, styles, navigation, ads, comments and anything else
that is not part of the recipe. Fix broken encoding and spacing. If several
recipes are mixed together, keep the main one.

Format the recipe as plain text:
- the title on the first line, then an empty line
- "Ingredients:" followed by one "- " line per ingredient, then an empty line
- "Instructions:" followed by numbered steps ("1.", "2.", ...)
- prep time, cook time and servings afterwards, when given

Keep quantities, fractions, temperatures and preparation notes ("chopped",
"softened") exactly. Keep each ingredient and each step on one line.

Respond with JSON only: {"text": string}
`.trim();

export const EXTRACTION_SYSTEM_PROMPT = `
You extract a structured recipe from cleaned recipe text.

Respond with JSON only:
- title: the recipe title
- ingredients: one string per ingredient, quantity and unit included
  (e.g. "1/4 cup basil leaves, packed")
- instructions: one string per step, in order, without step numbers

Leave a list empty when the text does not contain it.
`.trim();
