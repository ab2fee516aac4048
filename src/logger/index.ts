import {
    trace,
    Tracer,
    Context,
    Exception,
    Attributes,
    SpanStatus,
    AttributeValue,
} from "@opentelemetry/api";

/** Default instrumentation scope name */
export const DEFAULT_TRACER_NAME = "dynamic-multicall" as const;

/**
 * A span that is assembled in memory without an active tracer and exported
 * later as a whole, so operations can record their report regardless of
 * whether a logger was configured
 */
export class PreAssembledSpan {
    readonly name: string;
    readonly startTime: number;
    endTime?: number;
    status?: SpanStatus;
    exception?: Exception;
    readonly attributes: Attributes = {};

    constructor(name: string, startTime = Date.now()) {
        this.name = name;
        this.startTime = startTime;
    }

    /** Sets an attribute, bigint values are stored as strings */
    setAttr(key: string, value: AttributeValue | bigint) {
        this.attributes[key] = typeof value === "bigint" ? value.toString() : value;
    }

    /**
     * Sets all the given attributes, optionally prefixing their keys with a header
     * @param attrs - The attributes
     * @param header - Optional key prefix, joined with a dot
     */
    extendAttrs(attrs: Attributes, header?: string) {
        for (const key in attrs) {
            this.attributes[header ? `${header}.${key}` : key] = attrs[key];
        }
    }

    setStatus(status: SpanStatus) {
        this.status = status;
    }

    recordException(exception: Exception) {
        this.exception = exception;
    }

    /** Ends the span, later calls keep the first end time */
    end(endTime = Date.now()) {
        if (this.endTime === undefined) this.endTime = endTime;
    }

    /** Duration in milliseconds, undefined until the span has ended */
    get duration(): number | undefined {
        return this.endTime === undefined ? undefined : this.endTime - this.startTime;
    }
}

/**
 * Exports pre-assembled spans through an OpenTelemetry tracer. Without a
 * registered otel SDK the api's no-op tracer is used and nothing is recorded.
 */
export class MulticallLogger {
    readonly tracer: Tracer;

    constructor(tracer: Tracer = trace.getTracer(DEFAULT_TRACER_NAME)) {
        this.tracer = tracer;
    }

    /**
     * Exports the given pre-assembled span as a real otel span
     * @param report - The pre-assembled span
     * @param context - Optional parent context
     */
    exportPreAssembledSpan(report: PreAssembledSpan, context?: Context) {
        const span = this.tracer.startSpan(
            report.name,
            { startTime: report.startTime, attributes: report.attributes },
            context,
        );
        if (report.exception) span.recordException(report.exception);
        if (report.status) span.setStatus(report.status);
        span.end(report.endTime);
    }
}
