/**
 * System prompt and tool descriptions for the CLI agent.
 *
 * The query syntax rules are given to the model verbatim so that it
 * composes queries the search endpoint accepts.
 *
 * @module clients/tool-descriptions
 */

export const SYNTAX_RULES = `Following are the syntax rules for searching files in Bitbucket:
A query in Bitbucket has to contain one search term.
Search operators are words that can be added to searches to help narrow down the results. Operators must be in ALL CAPS. These are the search operators that can be used to search for files:
AND
OR
NOT
-
(  )
Multiple terms can be used, and they form a boolean query that implicitly uses the AND operator. So a query for "bitbucket server" is equivalent to "bitbucket AND server".
Wildcard searches (e.g. qu?ck buil*) and regular expressions in queries are not supported.
Single characters within search terms are ignored as they’re not indexed by Bitbucket for performance reasons (e.g. searching for “foo a bar” is the same as searching for just “foo bar” as the character “a” in the search is ignored).
Case is not preserved, however search operators must be in ALL CAPS.
Queries cannot have more than 9 expressions (e.g. combinations of terms and operators).
To specify a programming language, use the \`lang:\` operator followed by the language name (e.g. \`lang:python\`), so if the query is "my_function lang:python", it will search for the term "def my_function" in Python files.
Bitbucket can group repositories by projects. To specify a project use  project: operator followed by the project name (e.g. \`project:my_project\`), so if the query is "my_function project:my_project", it will search for the term "def my_function" in files of the specified project.
`;

/**
 * System prompt for code search conversations.
 */
export function getSystemPrompt(): string {
  return `Act as a Senior Software engineer. Use the code search tools to search for code in Bitbucket. ${SYNTAX_RULES} Be sure to use the correct syntax for Bitbucket code search.`;
}

/**
 * Description for the raw matches tool.
 */
export const RAW_MATCHES_DESCRIPTION = `Search code in the Bitbucket workspace and return every match as JSON.

Parameters:
- search_query (required): Query in Bitbucket code search syntax

Returns: JSON array of code search results. Each result has:
- file.path: Path of the file within its repository
- file.links.self.href: API link containing the repository name
- content_matches[].lines[]: { line, segments: [{ text, match }] }

Example output:
[{"type":"code_search_result","content_match_count":1,"content_matches":[{"lines":[{"line":3,"segments":[{"text":"def "},{"text":"foo","match":true},{"text":"():"}]}]}],"file":{"path":"src/foo.py","links":{"self":{"href":"https://api.bitbucket.org/2.0/repositories/my-workspace/demo/src/abc123/src/foo.py"}}}}]`;

/**
 * Description for the file names tool.
 */
export const FILE_NAMES_DESCRIPTION = `Search code in the Bitbucket workspace and return only the names of matching files.

Parameters:
- search_query (required): Query in Bitbucket code search syntax

Returns: One file per line, prefixed with its repository when known.
Example output:
demo/src/foo.py
demo/tests/test_foo.py`;
