import { Fragment } from 'react'
import type { FormattedValue } from '../types'
import { styles, theme } from '../theme'

export const EMPTY_MARKER = '—'

export function Breadcrumb({ segments }: { segments: string[] }) {
  return (
    <span className="breadcrumb">
      {segments.map((s, i) => (
        <Fragment key={i}>
          {i > 0 && (
            <span aria-hidden="true" style={{ color: theme.colors.textFaded, margin: '0 6px' }}>
              ›
            </span>
          )}
          <span>{s}</span>
        </Fragment>
      ))}
    </span>
  )
}

/** One cell value, wrapped by content class. Text is always passed as children so React escapes it. */
export function FormattedValueView({ value }: { value: FormattedValue }) {
  switch (value.kind) {
    case 'empty':
      return <span style={styles.emptyCell}>{EMPTY_MARKER}</span>
    case 'plain': {
      const lines = value.text.split('\n')
      return (
        <span>
          {lines.map((line, i) => (
            <Fragment key={i}>
              {i > 0 && <br />}
              {line}
            </Fragment>
          ))}
        </span>
      )
    }
    case 'url':
      return (
        <a href={value.href} target="_blank" rel="noopener noreferrer">
          {value.attachment ? `📎 ${value.attachment}` : value.text}
        </a>
      )
    case 'file':
      return <span className="file">{`📎 ${value.name}`}</span>
    case 'json':
      return <pre style={styles.pre}>{value.pretty}</pre>
    case 'date':
      return <time dateTime={value.iso}>{value.text}</time>
    case 'coordinate':
      return <span className="coordinate">{`(${value.x}, ${value.y})`}</span>
    case 'timing':
      return <span className="timing">{`${value.label}: ${value.text}`}</span>
    case 'hierarchy':
      return <Breadcrumb segments={value.segments} />
    case 'list':
      return (
        <ul style={{ margin: 0, paddingLeft: 20 }}>
          {value.items.map((item, i) => (
            <li key={i}>{item}</li>
          ))}
        </ul>
      )
    case 'longText':
      return (
        <div className="long-text">
          {value.paragraphs.map((p, i) => (
            <p key={i} style={{ margin: '0 0 8px', ...styles.textBody }}>
              {p}
            </p>
          ))}
        </div>
      )
    case 'code':
      return (
        <span style={styles.badge}>
          {value.codes.length > 1 ? `Selections: ${value.codes.join(', ')}` : `Code: ${value.codes[0]}`}
        </span>
      )
  }
}
