import { randomUUID } from 'node:crypto'
import type { AuditLog } from '../audit/audit-log.js'
import { SystemError, ValidationError, toAppError, type AppError } from '../errors.js'
import type { LedgerClient } from '../ledger/types.js'
import { createNoopLogger, type Logger } from '../logger.js'
import type { MessageRenderer } from '../messages.js'
import { textMessage, withNotice, type OutboundMessage } from '../outbound.js'
import type { FlowState, FlowType, JsonObject, Session, StepResult } from '../state/types.js'
import type {
  FlowContext,
  FlowDefinition,
  FlowInput,
  FlowRegistry,
  StepDefinition,
  StepView
} from './types.js'
import { isCancelInput } from './validators.js'

export type FlowOutcome =
  | { status: 'running'; flow: FlowState; message: OutboundMessage }
  | { status: 'invalid'; flow: FlowState; message: OutboundMessage; error: ValidationError }
  | { status: 'completed'; flow: null; message: OutboundMessage }
  | { status: 'cancelled'; flow: null; message: OutboundMessage }
  | { status: 'errored'; flow: null; flowId: string; stepId: string | null; error: AppError }

export interface FlowEngineDeps {
  flows: FlowRegistry
  audit: AuditLog
  ledger: LedgerClient
  messages: MessageRenderer
  logger?: Logger
  idGenerator?: () => string
  now?: () => Date
}

export interface FlowEngine {
  start(flowType: FlowType, session: Session, initialContext?: JsonObject): Promise<FlowOutcome>
  processInput(session: Session, input: FlowInput): Promise<FlowOutcome>
  definition(flowType: FlowType): FlowDefinition
}

interface ResolvedStep {
  step: StepDefinition
  index: number
}

/**
 * The current step is the first one, in declaration order, whose condition
 * holds and whose result is not yet recorded.
 */
export function resolveCurrentStep(definition: FlowDefinition, view: StepView): ResolvedStep | null {
  for (let index = 0; index < definition.steps.length; index++) {
    const step = definition.steps[index]
    if (view.data[step.id] !== undefined) {
      continue
    }
    if (step.condition && !step.condition(view)) {
      continue
    }
    return { step, index }
  }
  return null
}

export function createFlowEngine(deps: FlowEngineDeps): FlowEngine {
  const { flows, audit, ledger, messages } = deps
  const logger = deps.logger ?? createNoopLogger()
  const idGenerator = deps.idGenerator ?? randomUUID
  const now = deps.now ?? (() => new Date())

  function definition(flowType: FlowType): FlowDefinition {
    return flows[flowType]
  }

  function contextFor(session: Session, state: FlowState): FlowContext {
    return {
      session,
      data: state.stepData,
      context: state.context,
      identity: session.channelIdentity,
      flowId: state.flowId,
      ledger
    }
  }

  async function finish(session: Session, state: FlowState): Promise<FlowOutcome> {
    const flowDefinition = definition(state.flowType)
    try {
      const message = await flowDefinition.complete(contextFor(session, state))
      audit.logFlowEvent(state.flowId, 'complete', null, { flowType: state.flowType }, 'success')
      logger.info({ event: 'flow_completed', flowId: state.flowId, flowType: state.flowType })
      return { status: 'completed', flow: null, message }
    } catch (error) {
      const appError = toAppError(error)
      audit.logFlowEvent(
        state.flowId,
        'complete',
        null,
        { flowType: state.flowType, errorKind: appError.kind },
        'failure',
        appError.message
      )
      logger.error({ event: 'flow_completion_failed', flowId: state.flowId, flowType: state.flowType, error: appError })
      return { status: 'errored', flow: null, flowId: state.flowId, stepId: null, error: appError }
    }
  }

  function running(session: Session, state: FlowState, resolved: ResolvedStep): FlowOutcome {
    const next: FlowState = { ...state, stepIndex: resolved.index }
    audit.logFlowEvent(next.flowId, 'step_start', resolved.step.id, { flowType: next.flowType, stepIndex: resolved.index }, 'in_progress')
    return {
      status: 'running',
      flow: next,
      message: resolved.step.message({ session, data: next.stepData, context: next.context })
    }
  }

  async function start(flowType: FlowType, session: Session, initialContext: JsonObject = {}): Promise<FlowOutcome> {
    const state: FlowState = {
      flowId: idGenerator(),
      flowType,
      stepIndex: 0,
      stepData: {},
      startedAt: now().toISOString(),
      context: initialContext
    }

    audit.logFlowEvent(state.flowId, 'flow_start', null, { flowType, context: initialContext }, 'in_progress')
    logger.info({ event: 'flow_started', flowId: state.flowId, flowType })

    const resolved = resolveCurrentStep(definition(flowType), { session, data: state.stepData, context: state.context })
    if (!resolved) {
      return finish(session, state)
    }
    return running(session, state, resolved)
  }

  function rejectInput(session: Session, state: FlowState, step: StepDefinition, error: ValidationError): FlowOutcome {
    audit.logFlowEvent(state.flowId, 'validation_error', step.id, { reason: error.reasonKey }, 'failure', error.message)
    logger.info({ event: 'flow_input_invalid', flowId: state.flowId, stepId: step.id, reason: error.reasonKey })
    const prompt = step.message({ session, data: state.stepData, context: state.context })
    return {
      status: 'invalid',
      flow: state,
      message: withNotice(prompt, messages.render(error.reasonKey)),
      error
    }
  }

  async function processInput(session: Session, input: FlowInput): Promise<FlowOutcome> {
    const state = session.flow
    if (!state) {
      return {
        status: 'errored',
        flow: null,
        flowId: 'none',
        stepId: null,
        error: new SystemError('No active flow to process input for')
      }
    }

    const flowDefinition = definition(state.flowType)
    const view: StepView = { session, data: state.stepData, context: state.context }
    const resolved = resolveCurrentStep(flowDefinition, view)

    if (isCancelInput(input)) {
      audit.logFlowEvent(state.flowId, 'cancelled', resolved?.step.id ?? null, { flowType: state.flowType }, 'success')
      logger.info({ event: 'flow_cancelled', flowId: state.flowId, flowType: state.flowType })
      return { status: 'cancelled', flow: null, message: textMessage(messages.render('flow_cancelled')) }
    }

    if (!resolved) {
      return finish(session, state)
    }

    const { step } = resolved
    const validation = step.validate(input, view)
    audit.logValidationEvent(state.flowId, step.id, input.value, validation.valid, validation.valid ? undefined : validation.reason)
    if (!validation.valid) {
      return rejectInput(session, state, step, new ValidationError(`Invalid input for step ${step.id}`, validation.reason))
    }

    let result: StepResult
    try {
      result = await step.transform(input, contextFor(session, state))
    } catch (error) {
      if (error instanceof ValidationError) {
        return rejectInput(session, state, step, error)
      }
      const appError = toAppError(error)
      audit.logFlowEvent(
        state.flowId,
        'process_error',
        step.id,
        { flowType: state.flowType, errorKind: appError.kind },
        'failure',
        appError.message
      )
      logger.error({ event: 'flow_step_failed', flowId: state.flowId, stepId: step.id, error: appError })
      return { status: 'errored', flow: null, flowId: state.flowId, stepId: step.id, error: appError }
    }

    const advanced: FlowState = {
      ...state,
      stepData: { ...state.stepData, [step.id]: result }
    }
    audit.logFlowEvent(state.flowId, 'step_complete', step.id, { flowType: state.flowType }, 'success')

    const next = resolveCurrentStep(flowDefinition, { session, data: advanced.stepData, context: advanced.context })
    if (!next) {
      return finish(session, advanced)
    }
    return running(session, advanced, next)
  }

  return { start, processInput, definition }
}
