import type { TodoItem, TodoSearch, TodoSearchResult, TodoStore } from "./todo-types.js";

const STOP_WORDS = new Set([
  "about",
  "all",
  "and",
  "any",
  "are",
  "for",
  "find",
  "from",
  "have",
  "list",
  "related",
  "show",
  "task",
  "that",
  "the",
  "this",
  "todo",
  "what",
  "with"
]);

const TITLE_MATCH_SCORE = 3;
const DESCRIPTION_MATCH_SCORE = 2;
const PREFIX_MATCH_SCORE = 1;
const MIN_PREFIX_LENGTH = 3;

export class LexicalTodoSearch implements TodoSearch {
  constructor(private readonly store: TodoStore) {}

  async search(query: string, limit: number): Promise<TodoSearchResult[]> {
    const queryTerms = tokenize(query);
    if (queryTerms.length === 0 || limit <= 0) {
      return [];
    }

    const todos = await this.store.list();
    const results: TodoSearchResult[] = [];

    for (const todo of todos) {
      const score = scoreTodo(queryTerms, todo);
      if (score <= 0) {
        continue;
      }

      results.push({
        id: todo.id,
        title: todo.title,
        description: todo.description,
        created_at: todo.created_at,
        text: todoSearchText(todo),
        score
      });
    }

    results.sort((left, right) => {
      if (left.score !== right.score) {
        return right.score - left.score;
      }
      return left.id - right.id;
    });

    return results.slice(0, Math.floor(limit));
  }
}

export function tokenize(text: string): string[] {
  const terms: string[] = [];
  for (const word of text.toLowerCase().split(/[^a-z0-9]+/)) {
    if (word.length < 3) {
      continue;
    }

    const folded = foldPlural(word);
    if (STOP_WORDS.has(folded) || STOP_WORDS.has(word)) {
      continue;
    }

    if (!terms.includes(folded)) {
      terms.push(folded);
    }
  }

  return terms;
}

export function scoreTodo(queryTerms: readonly string[], todo: TodoItem): number {
  const titleTerms = tokenize(todo.title);
  const descriptionTerms = todo.description ? tokenize(todo.description) : [];

  let score = 0;
  for (const term of queryTerms) {
    if (titleTerms.includes(term)) {
      score += TITLE_MATCH_SCORE;
    } else if (descriptionTerms.includes(term)) {
      score += DESCRIPTION_MATCH_SCORE;
    } else if (hasPrefixMatch(term, titleTerms) || hasPrefixMatch(term, descriptionTerms)) {
      score += PREFIX_MATCH_SCORE;
    }
  }

  return score;
}

function todoSearchText(todo: TodoItem): string {
  return todo.description ? `${todo.title}: ${todo.description}` : todo.title;
}

function hasPrefixMatch(term: string, candidates: readonly string[]): boolean {
  if (term.length < MIN_PREFIX_LENGTH) {
    return false;
  }

  return candidates.some(
    (candidate) =>
      candidate.length >= MIN_PREFIX_LENGTH && (candidate.startsWith(term) || term.startsWith(candidate))
  );
}

function foldPlural(word: string): string {
  if (word.length > 3 && word.endsWith("s") && !word.endsWith("ss")) {
    return word.slice(0, -1);
  }

  return word;
}
