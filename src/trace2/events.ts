import { z } from 'zod'
import { parseEpoch } from './time.js'

const EpochSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
    const parsed = parseEpoch(value)
    if (!parsed.ok) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error })
        return z.NEVER
    }
    return parsed.value
})

const ArgvSchema = z.array(z.string())

const base = { sid: z.string().min(1) }

export const VersionEventSchema = z.object({ ...base, event: z.literal('version'), exe: z.string().optional() })
export const StartEventSchema = z.object({ ...base, event: z.literal('start'), time: EpochSchema, argv: ArgvSchema.default([]) })
export const CmdNameEventSchema = z.object({
    ...base,
    event: z.literal('cmd_name'),
    name: z.string(),
    hierarchy: z.string().transform((h) => h.split('/')),
})
export const DefRepoEventSchema = z.object({ ...base, event: z.literal('def_repo'), worktree: z.string() })
export const ExitEventSchema = z.object({ ...base, event: z.literal('exit'), time: EpochSchema, code: z.number().int() })
export const SignalEventSchema = z.object({ ...base, event: z.literal('signal'), time: EpochSchema, signo: z.number().int() })
export const AtExitEventSchema = z.object({ ...base, event: z.literal('atexit'), time: EpochSchema.optional(), code: z.number().int().optional() })

const regionFields = {
    ...base,
    time: EpochSchema,
    nesting: z.number().int().optional(),
    category: z.string().optional(),
    label: z.string().optional(),
}
export const RegionEnterEventSchema = z.object({ ...regionFields, event: z.literal('region_enter') })
export const RegionLeaveEventSchema = z.object({ ...regionFields, event: z.literal('region_leave') })

export const DataEventSchema = z.object({ ...base, event: z.literal('data'), category: z.string().optional(), key: z.string().optional() })
export const ChildStartEventSchema = z.object({
    ...base,
    event: z.literal('child_start'),
    child_id: z.number().int().optional(),
    argv: ArgvSchema.optional(),
})
export const ChildExitEventSchema = z.object({
    ...base,
    event: z.literal('child_exit'),
    child_id: z.number().int().optional(),
    code: z.number().int().optional(),
})
export const ExecEventSchema = z.object({ ...base, event: z.literal('exec'), exec_id: z.number().int().optional(), argv: ArgvSchema.optional() })
export const CmdModeEventSchema = z.object({ ...base, event: z.literal('cmd_mode'), name: z.string() })
export const ErrorEventSchema = z.object({ ...base, event: z.literal('error'), msg: z.string().optional() })
export const AliasEventSchema = z.object({ ...base, event: z.literal('alias'), alias: z.string(), argv: ArgvSchema.default([]) })

export const KnownEventSchema = z.discriminatedUnion('event', [
    VersionEventSchema,
    StartEventSchema,
    CmdNameEventSchema,
    DefRepoEventSchema,
    ExitEventSchema,
    SignalEventSchema,
    AtExitEventSchema,
    RegionEnterEventSchema,
    RegionLeaveEventSchema,
    DataEventSchema,
    ChildStartEventSchema,
    ChildExitEventSchema,
    ExecEventSchema,
    CmdModeEventSchema,
    ErrorEventSchema,
    AliasEventSchema,
])

export type KnownEvent = z.infer<typeof KnownEventSchema>
export type KnownEventType = KnownEvent['event']

const KNOWN_EVENT_TYPE_LIST = [
    'version',
    'start',
    'cmd_name',
    'def_repo',
    'exit',
    'signal',
    'atexit',
    'region_enter',
    'region_leave',
    'data',
    'child_start',
    'child_exit',
    'exec',
    'cmd_mode',
    'error',
    'alias',
] as const satisfies readonly KnownEventType[]

export const KNOWN_EVENT_TYPES: ReadonlySet<string> = new Set<string>(KNOWN_EVENT_TYPE_LIST)

/** Any tag this tool does not model; kept so diagnostics can echo it. */
export interface UnknownEvent {
    event: 'unknown'
    sid: string
    tag: string
}

export type Trace2Event = KnownEvent | UnknownEvent

export type RegionEvent = Extract<KnownEvent, { event: 'region_enter' | 'region_leave' }>

export type SkipReason = 'invalid-json' | 'not-an-object' | 'malformed-event'

export type DecodeResult =
    | { status: 'event'; event: Trace2Event }
    | { status: 'skip'; reason: SkipReason; message: string }
    | { status: 'fatal'; message: string }
