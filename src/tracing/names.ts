export function workflowSpanName(service: string): string {
    return `${service}.workflow.run`
}

export function agentSpanName(service: string, agent: string): string {
    return `${service}.agent.${agent}.run`
}

export function toolSpanName(service: string, tool: string): string {
    return `${service}.tool.${tool}.call`
}
