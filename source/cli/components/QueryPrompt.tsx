import React from 'react';
import {Box, Text} from 'ink';

type Props = {
	prompt: string;
	query: string;
};

/**
 * Prompt line with the query and a block cursor.
 */
export default function QueryPrompt({prompt, query}: Props) {
	return (
		<Box>
			<Text>
				{prompt}
				{query}
				<Text inverse> </Text>
			</Text>
		</Box>
	);
}
