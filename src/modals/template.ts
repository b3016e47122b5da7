/**
 * Modal templates: declare a modal's fields once, use the declaration both
 * to build the modal payload and to pull typed values out of its submission.
 *
 *   const report = ModalTemplate.empty()
 *     .addTextInput('reason', { label: 'Reason', style: 'paragraph' })
 *     .addTextInput('tag', { label: 'Tag', default: 'general' })
 *
 *   report.extract(interaction.fields) // { reason: string; tag: string }
 *
 * Templates are immutable; every add returns a new one. Field values are
 * typed through a zod object schema grown key by key.
 */

import { ComponentType, TextInputStyle } from 'discord-api-types/v10'
import type { APISelectMenuOption } from 'discord-api-types/v10'
import { z } from 'zod'
import { splitCustomId } from '../core/custom-id.js'
import { DuplicateCustomIdError, FieldTypeError, MissingFieldError } from '../core/errors.js'
import {
  LABEL_COMPONENT_TYPE,
  type ModalComponentPayload,
  type ModalFieldPayload,
  type ModalResponseData,
} from '../core/types.js'

// ==================== Field descriptors ====================

interface FieldBase {
  key: string
  customId: string
  prefixMatch: boolean
  label: string
}

export interface TextFieldDescriptor extends FieldBase {
  type: ComponentType.TextInput
  default?: string
  style: TextInputStyle
  placeholder?: string
  value?: string
  minLength?: number
  maxLength?: number
  required: boolean
}

export interface SelectFieldDescriptor extends FieldBase {
  type: ComponentType.StringSelect
  default?: string[]
  description?: string
  options: APISelectMenuOption[]
  placeholder?: string
  minValues?: number
  maxValues?: number
}

export type FieldDescriptor = TextFieldDescriptor | SelectFieldDescriptor

interface FieldOptionsBase {
  label: string
  /** Defaults to the key. */
  customId?: string
  /** Match submitted fields whose id starts with `customId`. */
  prefixMatch?: boolean
}

export interface TextInputOptions extends FieldOptionsBase {
  style?: 'short' | 'paragraph'
  placeholder?: string
  /** Pre-filled value shown in the modal. */
  value?: string
  minLength?: number
  maxLength?: number
  /** Used when the field is absent or left empty. Makes the input optional. */
  default?: string
}

export interface SelectOptions extends FieldOptionsBase {
  description?: string
  options: APISelectMenuOption[]
  placeholder?: string
  minValues?: number
  maxValues?: number
  /** Used when nothing was selected. */
  default?: string[]
}

// ==================== Template ====================

/** Values extracted from a submission of a template with shape `S`. */
export type ModalValues<S extends z.ZodRawShape> = z.infer<z.ZodObject<S>>

export class ModalTemplate<S extends z.ZodRawShape = {}> {
  constructor(
    readonly schema: z.ZodObject<S>,
    readonly fields: readonly FieldDescriptor[],
  ) {}

  static empty(): ModalTemplate {
    return new ModalTemplate(z.object({}), [])
  }

  addTextInput<K extends string>(key: K, options: TextInputOptions) {
    const field: TextFieldDescriptor = {
      key,
      type: ComponentType.TextInput,
      customId: options.customId ?? key,
      prefixMatch: options.prefixMatch ?? false,
      label: options.label,
      style: options.style === 'paragraph' ? TextInputStyle.Paragraph : TextInputStyle.Short,
      placeholder: options.placeholder,
      value: options.value,
      minLength: options.minLength,
      maxLength: options.maxLength,
      required: options.default === undefined,
      default: options.default,
    }
    return new ModalTemplate(this.schema.setKey(key, z.string()), this.withField(field))
  }

  addSelect<K extends string>(key: K, options: SelectOptions) {
    const field: SelectFieldDescriptor = {
      key,
      type: ComponentType.StringSelect,
      customId: options.customId ?? key,
      prefixMatch: options.prefixMatch ?? false,
      label: options.label,
      description: options.description,
      options: options.options,
      placeholder: options.placeholder,
      minValues: options.minValues,
      maxValues: options.maxValues,
      default: options.default,
    }
    return new ModalTemplate(this.schema.setKey(key, z.array(z.string())), this.withField(field))
  }

  /** Fields of `this` followed by those of `other`. */
  concat<P extends z.ZodRawShape>(other: ModalTemplate<P>) {
    let fields = this.fields
    for (const field of other.fields) fields = this.withField(field, fields)
    return new ModalTemplate(this.schema.merge(other.schema), fields)
  }

  /**
   * Read every field's value out of a submission. Absent or empty values fall
   * back to the field default; a required field with no value throws
   * MissingFieldError, a value from the wrong kind of input FieldTypeError.
   */
  extract(submitted: readonly ModalFieldPayload[]): ModalValues<S> {
    const raw: Record<string, unknown> = {}

    for (const field of this.fields) {
      const payload = findPayload(field, submitted)
      if (payload && payload.type !== field.type) {
        throw new FieldTypeError(field.key, field.type, payload.type)
      }

      const value = payload?.value
      if (value === undefined || value.length === 0) {
        if (field.default !== undefined) {
          raw[field.key] = field.default
          continue
        }
        if (value === undefined) throw new MissingFieldError(field.key, field.customId)
      }
      raw[field.key] = value
    }

    return this.schema.parse(raw)
  }

  /** Modal payload for this template. */
  build(customId: string, title: string): ModalResponseData {
    return { custom_id: customId, title, components: this.fields.map(buildComponent) }
  }

  private withField(field: FieldDescriptor, fields: readonly FieldDescriptor[] = this.fields): FieldDescriptor[] {
    const clash = fields.find((f) => f.key === field.key || f.customId === field.customId)
    if (clash) throw new DuplicateCustomIdError(field.customId, clash.prefixMatch ? 'prefix' : 'exact')
    return [...fields, field]
  }
}

// ==================== Helpers ====================

/** Exact match on the submitted id's match segment, then longest prefix. */
function findPayload(field: FieldDescriptor, submitted: readonly ModalFieldPayload[]): ModalFieldPayload | undefined {
  const exact = submitted.find((p) => splitCustomId(p.customId).match === field.customId)
  if (exact || !field.prefixMatch) return exact

  return submitted.find((p) => p.customId.startsWith(field.customId))
}

function buildComponent(field: FieldDescriptor): ModalComponentPayload {
  if (field.type === ComponentType.TextInput) {
    return {
      type: ComponentType.ActionRow,
      components: [{
        type: ComponentType.TextInput,
        custom_id: field.customId,
        label: field.label,
        style: field.style,
        required: field.required,
        ...(field.placeholder !== undefined ? { placeholder: field.placeholder } : {}),
        ...(field.value !== undefined ? { value: field.value } : {}),
        ...(field.minLength !== undefined ? { min_length: field.minLength } : {}),
        ...(field.maxLength !== undefined ? { max_length: field.maxLength } : {}),
      }],
    }
  }

  return {
    type: LABEL_COMPONENT_TYPE,
    label: field.label,
    ...(field.description !== undefined ? { description: field.description } : {}),
    component: {
      type: ComponentType.StringSelect,
      custom_id: field.customId,
      options: field.options,
      ...(field.placeholder !== undefined ? { placeholder: field.placeholder } : {}),
      ...(field.minValues !== undefined ? { min_values: field.minValues } : {}),
      ...(field.maxValues !== undefined ? { max_values: field.maxValues } : {}),
    },
  }
}
