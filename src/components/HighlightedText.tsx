import { splitMatch } from '../suggest/highlight';

interface HighlightedTextProps {
    text: string;
    query: string;
    caseSensitive: boolean;
}

export function HighlightedText({ text, query, caseSensitive }: HighlightedTextProps) {
    const parts = splitMatch(text, query, caseSensitive);
    if (!parts) {
        return <span className="suggest-field-label">{text}</span>;
    }

    return (
        <span className="suggest-field-label">
            {parts.before}
            <mark className="suggest-field-match">{parts.match}</mark>
            {parts.after}
        </span>
    );
}
