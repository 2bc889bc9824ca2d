/**
 * Auto-instrumentation for hosts with a two-stage registration decorator:
 *
 *   host.tool(...config)(handler)
 *
 * After enableToolLogging(host, ...) every handler registered through
 * host.tool is wrapped by the interceptor before the original decorator sees it.
 * Registrations made before the patch keep their unwrapped handlers.
 */

import { TelemetrySetupError } from '../lib/error.js';
import { log } from '../lib/logger.js';
import { instrumentHandler } from './interceptor.js';
import { createTelemetry } from './telemetry.js';
import type { AnyHandler, Telemetry, TelemetryOptions } from './types.js';

/** Second stage: finalizes registration of one handler. */
export type ToolDecorator<H extends AnyHandler, D> = (handler: H) => D;

/** First stage: takes registration config, returns the decorator. */
export type ToolRegistration<C extends unknown[], H extends AnyHandler, D> = (...config: C) => ToolDecorator<H, D>;

export interface DecoratorToolHost<C extends unknown[], H extends AnyHandler, D> {
	tool: ToolRegistration<C, H, D>;
}

export interface InstrumentRegistrationOptions<C extends unknown[], H extends AnyHandler> {
	/** Picks `tool_name`; defaults to the handler's declared name. */
	resolveToolName?: (config: C, handler: H) => string | undefined;
}

const patchedHosts = new WeakSet<object>();

/**
 * Compose an interceptor into a registration function. The result has the
 * original calling convention: it forwards `this` and `config` to `register`,
 * then wraps each handler before applying the original decorator.
 */
export function instrumentRegistration<C extends unknown[], H extends AnyHandler, D>(
	register: ToolRegistration<C, H, D>,
	telemetry: Telemetry,
	{ resolveToolName }: InstrumentRegistrationOptions<C, H> = {},
): ToolRegistration<C, H, D> {
	return function (this: unknown, ...config: C): ToolDecorator<H, D> {
		const decorate = register.apply(this, config);
		return (handler: H): D => decorate(instrumentHandler(handler, telemetry, resolveToolName?.(config, handler)));
	};
}

/**
 * Patch `host.tool` in place. Install once per host; a second install throws.
 *
 * @returns the telemetry context the wrappers share (its transport can be flushed on shutdown)
 */
export function enableToolLogging<C extends unknown[], H extends AnyHandler, D>(
	host: DecoratorToolHost<C, H, D>,
	options: TelemetryOptions & InstrumentRegistrationOptions<C, H>,
): Telemetry {
	if (typeof host !== 'object' || host === null || typeof host.tool !== 'function') {
		throw new TelemetrySetupError('host does not expose a tool() registration function');
	}
	if (patchedHosts.has(host)) {
		throw new TelemetrySetupError('tool logging is already enabled on this host');
	}

	const telemetry = createTelemetry(options);
	host.tool = instrumentRegistration(host.tool, telemetry, { resolveToolName: options.resolveToolName });
	patchedHosts.add(host);

	log('info', 'telemetry.enabled', { serverHost: telemetry.serverHost, entryPoint: 'tool' });
	return telemetry;
}
