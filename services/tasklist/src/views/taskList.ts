import type { TaskItem } from '../types';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function renderTaskRow(item: TaskItem): string {
  return (
    `<li data-id="${item.id}"><strong>${escapeHtml(item.name)}</strong>: ${escapeHtml(item.task)} ` +
    `<time datetime="${item.createdAt.toISOString()}">${item.createdAt.toISOString()}</time></li>`
  );
}

export function renderTaskListPage(items: TaskItem[]): string {
  const list = items.length
    ? `<ul class="todos">${items.map(renderTaskRow).join('')}</ul>`
    : '<p class="empty">No todos yet.</p>';

  return `<!doctype html>
<html lang="en">
<head><meta charset="utf-8"><title>Todo List</title></head>
<body>
<h1>Todo List</h1>
<form method="post" action="/add">
<input name="name" placeholder="Your name" maxlength="255" required>
<input name="task" placeholder="Task" required>
<button type="submit">Add</button>
</form>
${list}
</body>
</html>
`;
}

export function renderErrorPage(): string {
  return `<!doctype html>
<html lang="en">
<head><meta charset="utf-8"><title>Todo List</title></head>
<body><h1>Something went wrong</h1><p>Please try again shortly.</p></body>
</html>
`;
}
