import { ErrFacet, NotFound, TallyError } from '@tally/core'

export const CLIBoundary = TallyError.boundary("cli")

export const ErrSourceUnreadable = CLIBoundary.define('source_unreadable', {
  customProps: ErrFacet.props<{ path: string }>(),
  facets: [NotFound],
  message: (d) => `Cannot read source file: ${d.path}`,
})
