/**
 * Widget text composition from text channels.
 * @module core/text
 */
import {MAX_COMPOSED_TEXT_LENGTH} from '../wire/constants';
import type {ChannelStore} from './ChannelStore';
import type {TextBinding} from './types';
import {truncateText} from './utils';

/**
 * Compose the text shown by a widget.
 *
 * Non-empty channels named by `indices` are joined (space when inline,
 * newline otherwise). If that yields nothing the `index` channel is used,
 * then the static label, then `""`.
 */
export const composeText = (binding: TextBinding, channels: Pick<ChannelStore, 'getText'>): string => {
    let composed = '';
    if (binding.indices.length > 0) {
        const parts = binding.indices.map((index) => channels.getText(index)).filter((text) => text !== '');
        composed = parts.join(binding.inline ? ' ' : '\n');
    }
    if (composed === '' && binding.index >= 0) {
        composed = channels.getText(binding.index);
    }
    if (composed === '') {
        composed = binding.label;
    }
    return truncateText(composed, MAX_COMPOSED_TEXT_LENGTH);
};
