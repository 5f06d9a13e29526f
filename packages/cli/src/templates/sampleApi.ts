/**
 * Project Templates — Sample API Description
 *
 * A small but complete description that exercises every section the
 * parser knows: endpoints with bodies, query and path parameters,
 * object, array and primitive schemas, and literal and span
 * translations.
 *
 * @module
 */

export const SAMPLE_API_PATH = 'config/openapi/task.toml';

export function sampleApiToml(): string {
    return `name = "Tasks"

[[endpoints]]
path = "/task/new"
method = "POST"
summary = "Creates a task"

[endpoints.body]
schema = "newTask"

[[endpoints]]
path = "/task/list"
method = "GET"
summary = "Lists tasks"

[endpoints.query]
status = { type = "string", enum = ["Open", "Done"], description = "Task status" }
page = { type = "integer", default = 1, description = "Page number" }

[[endpoints]]
path = "/task/{task_id}/view"
method = "GET"
summary = "Gets a task by ID"

[endpoints.params]
task_id = { type = "string", format = "uuid", description = "Task ID" }

[[endpoints]]
path = "/task/{task_id}/update"
method = "POST"
summary = "Updates a task by ID"
body = "taskInfo"

[[endpoints]]
path = "/task/import"
method = "POST"
summary = "Imports tasks"
body = "taskBatch"

[schemas.taskId]
type = "string"
format = "uuid"
description = "Task ID"

[schemas.newTask]
type = "object"
required = ["title"]
title = { type = "string", description = "Task title" }
assignee = "taskId"
labels = { type = "array", items = "string", example = ["backend"], description = "Task labels" }

[schemas.taskInfo]
title = "string"
status = { type = "string", enum = ["Open", "Done"], default = "Open", description = "Task status" }

[schemas.taskBatch]
type = "array"
items = "object"
required = ["title"]
title = "string"
due = { type = "string", format = "date" }

[models.task.status]
translations = [
    ["Open", "To do"],
    ["Done", "Finished"],
]

[models.task.updated_at]
translations = [
    ["$span:1h", "Just now"],
    ["$span:24h", "Today"],
]
`;
}
