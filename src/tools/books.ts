/**
 * tools/books.ts — Reading list, relayed to the remote API.
 */

import type { ToolDefinition } from "./index.js";
import type { RemoteClient } from "../remote/client.js";
import { optionalString, requireString } from "./args.js";

export function bookTools(remote: RemoteClient): ToolDefinition[] {
    return [
        {
            spec: {
                name: "book_get_current",
                description: "Get the book currently being read.",
                inputSchema: { type: "object", properties: {}, additionalProperties: false },
            },
            async execute() {
                const book = await remote.getCurrentBook();
                return { ok: true, book };
            },
        },
        {
            spec: {
                name: "book_set_current",
                description: "Set the book currently being read.",
                inputSchema: {
                    type: "object",
                    properties: {
                        title: { type: "string", description: "Book title." },
                        author: { type: "string", description: "Author, if known." },
                    },
                    required: ["title"],
                    additionalProperties: false,
                },
            },
            async execute(args) {
                const title = requireString(args, "title");
                const author = optionalString(args, "author");
                const book = await remote.setCurrentBook({ title, author });
                return { ok: true, title, book };
            },
        },
        {
            spec: {
                name: "book_list_finished",
                description: "List finished books.",
                inputSchema: { type: "object", properties: {}, additionalProperties: false },
            },
            async execute() {
                const books = await remote.listFinishedBooks();
                return { ok: true, books };
            },
        },
        {
            spec: {
                name: "book_add_finished",
                description:
                    "Add a book to the finished list. An id is generated when none is given.",
                inputSchema: {
                    type: "object",
                    properties: {
                        title: { type: "string", description: "Book title." },
                        date: { type: "string", description: "Date finished, YYYY-MM-DD." },
                        book_id: { type: "string", description: "Optional id to reuse." },
                    },
                    required: ["title", "date"],
                    additionalProperties: false,
                },
            },
            async execute(args) {
                const { id, payload } = await remote.addFinishedBook({
                    title: requireString(args, "title"),
                    date: requireString(args, "date"),
                    id: optionalString(args, "book_id"),
                });
                return { ok: true, book_id: id, book: payload };
            },
        },
        {
            spec: {
                name: "book_delete_finished",
                description: "Remove a book from the finished list.",
                inputSchema: {
                    type: "object",
                    properties: {
                        book_id: { type: "string", description: "Id of the finished book." },
                    },
                    required: ["book_id"],
                    additionalProperties: false,
                },
            },
            async execute(args) {
                const bookId = requireString(args, "book_id");
                const result = await remote.deleteFinishedBook(bookId);
                return { ok: true, book_id: bookId, result };
            },
        },
    ];
}
