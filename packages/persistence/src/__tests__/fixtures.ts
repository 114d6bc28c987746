import { type Aggregate, BaseDomainEvent, DomainEvent, ExecutionContext } from '@castellan/domain-core';
import type { AggregateHandler } from '../aggregate-registry.js';

export interface Widget extends Aggregate {
	readonly name: string;
}

interface WidgetSavedData {
	readonly widgetId: string;
	readonly name: string;
	readonly [key: string]: unknown;
}

export class WidgetSaved extends BaseDomainEvent<WidgetSavedData> {
	constructor(ctx: ExecutionContext, widget: Widget, domain = 'inventory', aggregate = 'widget') {
		super(
			{
				eventType: DomainEvent.eventType('inventory', 'catalog', aggregate, 'saved'),
				specVersion: '1.0',
				source: 'inventory:catalog',
				subject: DomainEvent.subject(domain, aggregate, widget.id),
				messageGroup: DomainEvent.messageGroup(domain, aggregate, widget.id),
				sequence: widget.sequence,
				resourceOwner: widget.resourceOwner,
				time: widget.changeDate,
			},
			ctx,
			{ widgetId: widget.id, name: widget.name },
		);
	}
}

export const widgetHandler: AggregateHandler<Widget> = {
	typeName: 'widget',

	fromSnapshot(snapshot: unknown): Widget {
		if (
			typeof snapshot === 'object' &&
			snapshot !== null &&
			'id' in snapshot &&
			typeof snapshot.id === 'string' &&
			'sequence' in snapshot &&
			typeof snapshot.sequence === 'number' &&
			'resourceOwner' in snapshot &&
			typeof snapshot.resourceOwner === 'string' &&
			'changeDate' in snapshot &&
			typeof snapshot.changeDate === 'string' &&
			'name' in snapshot &&
			typeof snapshot.name === 'string'
		) {
			return {
				id: snapshot.id,
				sequence: snapshot.sequence,
				resourceOwner: snapshot.resourceOwner,
				changeDate: new Date(snapshot.changeDate),
				name: snapshot.name,
			};
		}
		throw new Error('Invalid widget snapshot');
	},

	uniqueConstraints(widget) {
		return [{ key: `widget-name:${widget.name}`, errorCode: 'WIDGET_NAME_TAKEN', errorMessage: 'Name is taken' }];
	},
};

export const ctx = ExecutionContext.create(
	{ principalId: 'user-1', instanceId: 'instance-1', orgId: 'org-1', memberships: [] },
	{ correlationId: 'corr-1' },
);

export function widget(id: string, sequence: number, name: string): Widget {
	return { id, sequence, resourceOwner: 'org-1', changeDate: new Date('2031-01-01T00:00:00.000Z'), name };
}
